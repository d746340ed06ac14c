import { DeliveryConfig } from '../config';
import { describeError } from '../transport/RemoteTransport';
import { ProgressEvent, ProgressListener, TestJob } from '../types/Delivery';
import { DeliveryEngine, DeliveryReport } from './DeliveryEngine';

export class RunnerBusyError extends Error {
  constructor() {
    super('A test run is already in progress');
    this.name = 'RunnerBusyError';
  }
}

/**
 * Feeds jobs to the delivery engine one at a time, in order. Cancellation is
 * honoured between jobs; the job already in flight always reaches its outcome.
 */
export class TestQueueRunner {
  private engine: DeliveryEngine;
  private config: DeliveryConfig;
  private listeners: Set<ProgressListener> = new Set();
  private running: boolean = false;
  private cancelRequested: boolean = false;

  constructor(engine: DeliveryEngine, config: DeliveryConfig) {
    this.engine = engine;
    this.config = config;
  }

  onProgress(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  /** Stops the current run before its next job. Returns false when nothing is running. */
  cancel(): boolean {
    if (!this.running) return false;
    this.cancelRequested = true;
    console.log('TestQueueRunner: cancellation requested; no further jobs will start');
    return true;
  }

  async *run(jobs: Iterable<TestJob>): AsyncGenerator<DeliveryReport, void, undefined> {
    if (this.running) {
      throw new RunnerBusyError();
    }
    this.running = true;
    this.cancelRequested = false;
    let processed = 0;

    try {
      for (const job of jobs) {
        if (this.cancelRequested) break;

        let report: DeliveryReport;
        try {
          report = await this.engine.deliver(job, this.config, (event) => this.notify(event));
        } catch (err) {
          console.error(`TestQueueRunner: job ${job.test_id} (${job.file_name}) rejected:`, describeError(err));
          this.notify({ type: 'job.rejected', testId: job.test_id, reason: describeError(err) });
          continue;
        }

        processed++;
        if (report.outcome.status === 'connection_error') {
          console.warn(`TestQueueRunner: ${job.file_name} ended with connection_error; continuing with next job`);
        }
        yield report;
      }
    } finally {
      const cancelled = this.cancelRequested;
      this.running = false;
      this.cancelRequested = false;
      this.notify({ type: 'run.finished', processed, cancelled });
    }
  }

  private notify(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        // Listener error should not break notification chain
        console.error('TestQueueRunner: progress listener failed:', err);
      }
    }
  }
}
