import Database from 'better-sqlite3';
import {
  ConnectionStatus,
  HistoryInput,
  HistoryRecord,
  OutcomeStatus,
  ResultSummary,
} from '../types/Delivery';
import { isOutcomeStatus } from '../utils/validation';

interface HistoryRow {
  id: number;
  timestamp: string;
  test_id: string;
  file_name: string;
  status: string;
  result: string | null;
  details: string | null;
  connection_status: string | null;
}

/** Append-only record of delivery outcomes. */
export interface HistoryStore {
  append(entry: HistoryInput): HistoryRecord;
  hasTestId(testId: string): boolean;
}

const CONNECTION_STATUSES: readonly ConnectionStatus[] = ['connected', 'upload_failed', 'probe_failed', 'download_failed'];

function isConnectionStatus(value: string): value is ConnectionStatus {
  return CONNECTION_STATUSES.some((s) => s === value);
}

function isResultSummary(value: unknown): value is ResultSummary {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return 'verdict' in value && 'document' in value && 'failures' in value && Array.isArray(value.failures);
}

function parseResult(raw: string | null): ResultSummary | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isResultSummary(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toRecord(row: HistoryRow): HistoryRecord {
  if (!isOutcomeStatus(row.status)) {
    throw new Error(`History row ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    timestamp: row.timestamp,
    test_id: row.test_id,
    file_name: row.file_name,
    status: row.status,
    result: parseResult(row.result),
    details: row.details,
    connection_status: row.connection_status !== null && isConnectionStatus(row.connection_status)
      ? row.connection_status
      : null,
  };
}

export class HistoryModel implements HistoryStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  append(entry: HistoryInput): HistoryRecord {
    const stmt = this.db.prepare(`
      INSERT INTO history (timestamp, test_id, file_name, status, result, details, connection_status)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const info = stmt.run(
      entry.timestamp,
      entry.test_id,
      entry.file_name,
      entry.status,
      entry.result === null ? null : JSON.stringify(entry.result),
      entry.details,
      entry.connection_status,
    );

    const record = this.getById(Number(info.lastInsertRowid));
    if (!record) {
      throw new Error(`History record for ${entry.test_id} was not readable after insert`);
    }
    return record;
  }

  hasTestId(testId: string): boolean {
    const row = this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM history WHERE test_id = ?').get(testId);
    return row !== undefined;
  }

  getById(id: number): HistoryRecord | undefined {
    const row = this.db.prepare<[number], HistoryRow>('SELECT * FROM history WHERE id = ?').get(id);
    return row ? toRecord(row) : undefined;
  }

  getByTestId(testId: string): HistoryRecord | undefined {
    const row = this.db.prepare<[string], HistoryRow>('SELECT * FROM history WHERE test_id = ?').get(testId);
    return row ? toRecord(row) : undefined;
  }

  getRecent(limit: number, status?: OutcomeStatus): HistoryRecord[] {
    if (status) {
      return this.db
        .prepare<[string, number], HistoryRow>('SELECT * FROM history WHERE status = ? ORDER BY id DESC LIMIT ?')
        .all(status, limit)
        .map(toRecord);
    }
    return this.db
      .prepare<[number], HistoryRow>('SELECT * FROM history ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map(toRecord);
  }

  countByStatus(): Record<OutcomeStatus, number> {
    const counts: Record<OutcomeStatus, number> = { success: 0, failure: 0, timeout: 0, connection_error: 0 };
    const rows = this.db
      .prepare<[], { status: string; cnt: number }>('SELECT status, COUNT(*) AS cnt FROM history GROUP BY status')
      .all();
    for (const row of rows) {
      if (isOutcomeStatus(row.status)) counts[row.status] = row.cnt;
    }
    return counts;
  }

  count(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM history').get();
    return row?.cnt || 0;
  }
}
