import { v4 as uuidv4 } from 'uuid';
import { OutcomeStatus, TestJob } from '../types/Delivery';
import { RunnerBusyError, TestQueueRunner } from './TestQueueRunner';

export interface RunEntry {
  test_id: string;
  file_name: string;
  status: OutcomeStatus;
  details: string | null;
  history_id: number | null;
  persistence_warning: string | null;
}

export interface RunSnapshot {
  runId: string | null;
  active: boolean;
  total: number;
  completed: number;
  cancelled: boolean;
  startedAt: string | null;
  finishedAt: string | null;
  results: RunEntry[];
  rejected: { test_id: string; reason: string }[];
}

function emptySnapshot(): RunSnapshot {
  return {
    runId: null,
    active: false,
    total: 0,
    completed: 0,
    cancelled: false,
    startedAt: null,
    finishedAt: null,
    results: [],
    rejected: [],
  };
}

/** Owns the single active run behind the HTTP API and keeps its progress for polling clients. */
export class RunController {
  private runner: TestQueueRunner;
  private snapshot: RunSnapshot = emptySnapshot();
  private current: Promise<void> | null = null;

  constructor(runner: TestQueueRunner) {
    this.runner = runner;
    this.runner.onProgress((event) => {
      if (event.type === 'job.rejected') {
        this.snapshot.rejected.push({ test_id: event.testId, reason: event.reason });
      } else if (event.type === 'run.finished' && this.snapshot.active) {
        this.snapshot.cancelled = event.cancelled;
      }
    });
  }

  isActive(): boolean {
    return this.snapshot.active;
  }

  start(jobs: TestJob[]): string {
    if (this.snapshot.active || this.runner.isRunning()) {
      throw new RunnerBusyError();
    }

    const runId = uuidv4();
    this.snapshot = {
      ...emptySnapshot(),
      runId,
      active: true,
      total: jobs.length,
      startedAt: new Date().toISOString(),
    };
    console.log(`RunController: run ${runId} started with ${jobs.length} job(s)`);

    this.current = this.consume(runId, jobs).catch((err) => {
      console.error(`RunController: run ${runId} aborted:`, err);
    }).finally(() => {
      if (this.snapshot.runId === runId) {
        this.snapshot.active = false;
        this.snapshot.finishedAt = new Date().toISOString();
      }
    });
    return runId;
  }

  cancel(): boolean {
    if (!this.snapshot.active) return false;
    return this.runner.cancel();
  }

  getSnapshot(): RunSnapshot {
    return {
      ...this.snapshot,
      results: [...this.snapshot.results],
      rejected: [...this.snapshot.rejected],
    };
  }

  /** Resolves once the current run (if any) has finished. */
  async waitForIdle(): Promise<void> {
    if (this.current) await this.current;
  }

  private async consume(runId: string, jobs: TestJob[]): Promise<void> {
    for await (const report of this.runner.run(jobs)) {
      if (this.snapshot.runId !== runId) continue;
      this.snapshot.completed++;
      this.snapshot.results.push({
        test_id: report.job.test_id,
        file_name: report.job.file_name,
        status: report.outcome.status,
        details: report.outcome.details,
        history_id: report.record.id,
        persistence_warning: report.persistenceError ? report.persistenceError.message : null,
      });
    }
  }
}
