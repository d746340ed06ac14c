import Database from 'better-sqlite3';

export interface ConnectionLogRecord {
  id: number;
  timestamp: string;
  host: string;
  status: string;
  details: string;
}

export class ConnectionLogModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  create(entry: { host: string; status: string; details?: string }): ConnectionLogRecord {
    const info = this.db
      .prepare('INSERT INTO connection_log (host, status, details) VALUES (?, ?, ?)')
      .run(entry.host, entry.status, entry.details || '');
    const record = this.db
      .prepare<[number], ConnectionLogRecord>('SELECT * FROM connection_log WHERE id = ?')
      .get(Number(info.lastInsertRowid));
    if (!record) {
      throw new Error('Connection log entry was not readable after insert');
    }
    return record;
  }

  getRecent(limit: number): ConnectionLogRecord[] {
    return this.db
      .prepare<[number], ConnectionLogRecord>('SELECT * FROM connection_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }
}
