import { posix } from 'path';
import { DeliveryConfig } from '../config';
import { HistoryStore } from '../models/History';
import { RemoteFileStat, RemoteTransport, describeError } from '../transport/RemoteTransport';
import { HistoryInput, HistoryRecord, Outcome, PollSignal, ProgressListener, TestJob } from '../types/Delivery';
import { Clock, systemClock } from '../utils/clock';
import { OutcomeClassifier } from './OutcomeClassifier';
import { PollingScheduler } from './PollingScheduler';

export class PersistenceError extends Error {
  readonly testId: string;

  constructor(testId: string, message: string) {
    super(message);
    this.name = 'PersistenceError';
    this.testId = testId;
  }
}

export class DuplicateTestIdError extends Error {
  readonly testId: string;

  constructor(testId: string) {
    super(`Test id "${testId}" is already recorded in history`);
    this.name = 'DuplicateTestIdError';
    this.testId = testId;
  }
}

export interface DeliveryReport {
  job: TestJob;
  outcome: Outcome;
  record: HistoryRecord;
  persistenceError: PersistenceError | null;
}

export function resultFileName(template: string, job: Pick<TestJob, 'test_id' | 'file_name'>): string {
  const base = job.file_name.replace(/\.json$/i, '');
  return template
    .split('{base}').join(base)
    .split('{fileName}').join(job.file_name)
    .split('{testId}').join(job.test_id);
}

export function resultPathFor(config: DeliveryConfig, job: Pick<TestJob, 'test_id' | 'file_name'>): string {
  return posix.join(config.resultDir, resultFileName(config.resultFileTemplate, job));
}

/** Runs one job through upload, result polling, classification and persistence. */
export class DeliveryEngine {
  private transport: RemoteTransport;
  private scheduler: PollingScheduler;
  private classifier: OutcomeClassifier;
  private store: HistoryStore;
  private clock: Clock;

  constructor(
    transport: RemoteTransport,
    store: HistoryStore,
    options: { scheduler?: PollingScheduler; classifier?: OutcomeClassifier; clock?: Clock } = {},
  ) {
    this.transport = transport;
    this.store = store;
    this.clock = options.clock || systemClock;
    this.scheduler = options.scheduler || new PollingScheduler(transport, this.clock);
    this.classifier = options.classifier || new OutcomeClassifier();
  }

  async deliver(job: TestJob, config: DeliveryConfig, onProgress?: ProgressListener): Promise<DeliveryReport> {
    if (this.store.hasTestId(job.test_id)) {
      throw new DuplicateTestIdError(job.test_id);
    }

    const emit: ProgressListener = (event) => {
      if (!onProgress) return;
      try {
        onProgress(event);
      } catch (err) {
        console.error('DeliveryEngine: progress listener failed:', err);
      }
    };

    emit({ type: 'job.started', testId: job.test_id, fileName: job.file_name, remotePath: job.remote_path });

    const resultPath = resultPathFor(config, job);
    const outcome = await this.runToOutcome(job, config, resultPath, emit);

    const entry: HistoryInput = {
      timestamp: new Date(this.clock.now()).toISOString(),
      test_id: job.test_id,
      file_name: job.file_name,
      status: outcome.status,
      result: outcome.result,
      details: outcome.details,
      connection_status: outcome.connection_status,
    };

    let record: HistoryRecord;
    let persistenceError: PersistenceError | null = null;
    try {
      record = this.store.append(entry);
    } catch (err) {
      persistenceError = new PersistenceError(job.test_id, `Failed to record history for ${job.test_id}: ${describeError(err)}`);
      console.error(`DeliveryEngine: ${persistenceError.message}`);
      record = { id: null, ...entry };
    }

    console.log(`DeliveryEngine: ${job.file_name} (${job.test_id}) finished with ${outcome.status}`);
    emit({
      type: 'job.finished',
      testId: job.test_id,
      record,
      persistenceError: persistenceError ? persistenceError.message : null,
    });

    return { job, outcome, record, persistenceError };
  }

  private async runToOutcome(
    job: TestJob,
    config: DeliveryConfig,
    resultPath: string,
    emit: ProgressListener,
  ): Promise<Outcome> {
    let baseline: RemoteFileStat | null;
    try {
      baseline = await this.transport.stat(resultPath);
    } catch (err) {
      console.error(`DeliveryEngine: result check before uploading ${job.file_name} failed:`, describeError(err));
      return {
        status: 'connection_error',
        result: null,
        details: `Result check before upload failed: ${describeError(err)}`,
        connection_status: 'upload_failed',
      };
    }

    try {
      await this.transport.upload(job.local_path, job.remote_path);
      console.log(`DeliveryEngine: uploaded ${job.local_path} -> ${job.remote_path}`);
    } catch (err) {
      console.error(`DeliveryEngine: upload of ${job.file_name} failed:`, describeError(err));
      return {
        status: 'connection_error',
        result: null,
        details: `Upload failed: ${describeError(err)}`,
        connection_status: 'upload_failed',
      };
    }

    let signal: PollSignal;
    try {
      signal = await this.scheduler.waitForResult(resultPath, config.polling, {
        baseline,
        onAttempt: (attempt) => emit({ type: 'poll.attempt', testId: job.test_id, ...attempt }),
      });
    } catch (err) {
      console.error(`DeliveryEngine: polling for ${job.file_name} failed unexpectedly:`, err);
      return {
        status: 'failure',
        result: null,
        details: `Unexpected error while waiting for result: ${describeError(err)}`,
        connection_status: 'connected',
      };
    }

    return this.classifier.classify(signal);
  }
}
