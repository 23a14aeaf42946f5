import Database from "better-sqlite3";
import path from "node:path";

export type SqliteDatabase = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_state (
  key TEXT PRIMARY KEY NOT NULL,
  email TEXT NOT NULL DEFAULT '',
  phone TEXT NOT NULL DEFAULT '',
  row_id TEXT,
  external_id TEXT,
  last_synced_hash TEXT NOT NULL,
  last_synced_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_state_email ON sync_state(email);
CREATE INDEX IF NOT EXISTS idx_sync_state_phone ON sync_state(phone);

CREATE TABLE IF NOT EXISTS sync_runs (
  id TEXT PRIMARY KEY NOT NULL,
  direction TEXT NOT NULL,
  status TEXT NOT NULL,
  created INTEGER NOT NULL DEFAULT 0,
  updated INTEGER NOT NULL DEFAULT 0,
  skipped INTEGER NOT NULL DEFAULT 0,
  failed INTEGER NOT NULL DEFAULT 0,
  conflicts INTEGER NOT NULL DEFAULT 0,
  started_at INTEGER NOT NULL,
  duration_ms INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_runs_started ON sync_runs(started_at);
`;

function resolveDatabasePath(url: string): string {
  if (url === ":memory:" || url === "file::memory:") return ":memory:";
  const file = url.startsWith("file:") ? url.slice("file:".length) : url;
  return path.resolve(process.cwd(), file);
}

/**
 * Open the SQLite database behind SyncState and the run history.
 * Accepts `file:./sync.db`, a bare path, or `:memory:` for tests.
 */
export function openDatabase(url = process.env.DATABASE_URL || "file:./sync.db"): SqliteDatabase {
  const db = new Database(resolveDatabasePath(url));
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);
  return db;
}
