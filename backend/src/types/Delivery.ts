export const OUTCOME_STATUSES = ['success', 'failure', 'timeout', 'connection_error'] as const;
export type OutcomeStatus = typeof OUTCOME_STATUSES[number];

export type ConnectionStatus = 'connected' | 'upload_failed' | 'probe_failed' | 'download_failed';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface TestJob {
  readonly test_id: string;
  readonly file_name: string;
  readonly local_path: string;
  readonly remote_path: string;
  readonly created_at: string;
}

export type RemoteFileState = 'absent' | 'incomplete' | 'complete';

export interface PollAttempt {
  attempt: number;
  at: string;
  state: RemoteFileState;
}

export type Verdict = 'pass' | 'fail' | 'partial' | 'unknown';

export interface FailedCase {
  service: string;
  action: string;
  message: string;
  execution_time_ms: number;
}

export interface ResultSummary {
  verdict: Verdict;
  total: number | null;
  passed: number | null;
  failed: number | null;
  duration_ms: number | null;
  failures: FailedCase[];
  document: JsonObject;
}

export type Outcome =
  | { status: 'success'; result: ResultSummary; details: string | null; connection_status: ConnectionStatus }
  | { status: 'failure'; result: null; details: string; connection_status: ConnectionStatus }
  | { status: 'timeout'; result: null; details: string; connection_status: ConnectionStatus }
  | { status: 'connection_error'; result: null; details: string; connection_status: ConnectionStatus };

export type PollSignal =
  | { kind: 'payload'; payload: Buffer; remotePath: string; attempts: number; elapsedMs: number }
  | { kind: 'timeout'; remotePath: string; attempts: number; elapsedMs: number }
  | { kind: 'connection_error'; stage: 'probe' | 'download'; message: string; remotePath: string; attempts: number; elapsedMs: number };

export interface HistoryRecord {
  /** Null only on the in-memory copy of a record the store failed to write. */
  id: number | null;
  timestamp: string;
  test_id: string;
  file_name: string;
  status: OutcomeStatus;
  result: ResultSummary | null;
  details: string | null;
  connection_status: ConnectionStatus | null;
}

export type HistoryInput = Omit<HistoryRecord, 'id'>;

export type ProgressEvent =
  | { type: 'job.started'; testId: string; fileName: string; remotePath: string }
  | { type: 'poll.attempt'; testId: string; attempt: number; state: RemoteFileState; at: string }
  | { type: 'job.finished'; testId: string; record: HistoryRecord; persistenceError: string | null }
  | { type: 'job.rejected'; testId: string; reason: string }
  | { type: 'run.finished'; processed: number; cancelled: boolean };

export type ProgressListener = (event: ProgressEvent) => void;
