import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS credentials (
  slot INTEGER PRIMARY KEY CHECK (slot = 1),
  access_token TEXT NOT NULL,
  refresh_token TEXT,
  expires_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_watermark (
  slot INTEGER PRIMARY KEY CHECK (slot = 1),
  last_synced_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS export_records (
  record_key TEXT PRIMARY KEY,
  data_hash TEXT NOT NULL,
  export_path TEXT NOT NULL,
  exported_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  scope TEXT,
  dry_run INTEGER NOT NULL DEFAULT 0,
  record_count INTEGER NOT NULL DEFAULT 0,
  output_path TEXT,
  status TEXT NOT NULL,
  error_code TEXT,
  error_message TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON sync_runs(started_at);
`;

/** Open (or create) a state database. Pass ":memory:" for a throwaway one. */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.exec(SCHEMA);
  return db;
}

let _db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!_db) {
    const dbPath = process.env.SYNC_STATE_PATH
      ? path.resolve(process.env.SYNC_STATE_PATH)
      : path.resolve(process.cwd(), "data", "sync_state.db");

    _db = openDatabase(dbPath);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
