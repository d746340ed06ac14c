import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export function createDatabase(dbPath?: string): Database.Database {
  if (dbPath && dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath || ':memory:');

  db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      test_id TEXT NOT NULL,
      file_name TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('success', 'failure', 'timeout', 'connection_error')),
      result TEXT,
      details TEXT,
      connection_status TEXT
    );

    CREATE TABLE IF NOT EXISTS connection_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      host TEXT NOT NULL,
      status TEXT NOT NULL,
      details TEXT DEFAULT ''
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_history_test_id ON history(test_id);
    CREATE INDEX IF NOT EXISTS idx_history_timestamp ON history(timestamp);
    CREATE INDEX IF NOT EXISTS idx_history_status ON history(status);
  `);

  // The history table is append-only: reject edits at the storage layer too.
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS history_no_update
    BEFORE UPDATE ON history
    BEGIN
      SELECT RAISE(ABORT, 'history records are immutable');
    END;

    CREATE TRIGGER IF NOT EXISTS history_no_delete
    BEFORE DELETE ON history
    BEGIN
      SELECT RAISE(ABORT, 'history records are append-only');
    END;
  `);

  return db;
}
