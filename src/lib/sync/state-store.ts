import type { SqliteDatabase } from "@/lib/db";
import type { PassStatus, SyncDirection, SyncReport, SyncStateEntry } from "./types";

/**
 * Durable SyncState. Any medium must offer point lookup, point upsert and a
 * full scan; `rekey` moves an entry whose fingerprint changed.
 */
export interface SyncStateStore {
  get(key: string): Promise<SyncStateEntry | null>;
  upsert(entry: SyncStateEntry): Promise<void>;
  rekey(oldKey: string, entry: SyncStateEntry): Promise<void>;
  all(): Promise<SyncStateEntry[]>;
}

export interface SyncRunSummary {
  id: string;
  direction: SyncDirection;
  status: PassStatus;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  conflicts: number;
  startedAt: Date;
  durationMs: number;
}

export interface SyncRunStore {
  record(report: SyncReport): Promise<void>;
  recent(limit: number): Promise<SyncRunSummary[]>;
}

interface StateRow {
  key: string;
  email: string;
  phone: string;
  row_id: string | null;
  external_id: string | null;
  last_synced_hash: string;
  last_synced_at: number;
}

interface RunRow {
  id: string;
  direction: SyncDirection;
  status: PassStatus;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  conflicts: number;
  started_at: number;
  duration_ms: number;
}

function fromRow(row: StateRow): SyncStateEntry {
  return {
    key: row.key,
    email: row.email,
    phone: row.phone,
    rowId: row.row_id ?? undefined,
    externalId: row.external_id ?? undefined,
    lastSyncedHash: row.last_synced_hash,
    lastSyncedAt: new Date(row.last_synced_at),
  };
}

function toParams(entry: SyncStateEntry) {
  return {
    key: entry.key,
    email: entry.email,
    phone: entry.phone,
    row_id: entry.rowId ?? null,
    external_id: entry.externalId ?? null,
    last_synced_hash: entry.lastSyncedHash,
    last_synced_at: entry.lastSyncedAt.getTime(),
  };
}

const UPSERT_SQL = `
  INSERT INTO sync_state (key, email, phone, row_id, external_id, last_synced_hash, last_synced_at)
  VALUES (@key, @email, @phone, @row_id, @external_id, @last_synced_hash, @last_synced_at)
  ON CONFLICT(key) DO UPDATE SET
    email = excluded.email,
    phone = excluded.phone,
    row_id = excluded.row_id,
    external_id = excluded.external_id,
    last_synced_hash = excluded.last_synced_hash,
    last_synced_at = excluded.last_synced_at
`;

export class SqliteSyncStateStore implements SyncStateStore {
  constructor(private readonly db: SqliteDatabase) {}

  async get(key: string): Promise<SyncStateEntry | null> {
    const row = this.db
      .prepare<[string], StateRow>("SELECT * FROM sync_state WHERE key = ?")
      .get(key);
    return row ? fromRow(row) : null;
  }

  async upsert(entry: SyncStateEntry): Promise<void> {
    this.db.prepare(UPSERT_SQL).run(toParams(entry));
  }

  async rekey(oldKey: string, entry: SyncStateEntry): Promise<void> {
    const move = this.db.transaction(() => {
      if (oldKey !== entry.key) {
        this.db.prepare("DELETE FROM sync_state WHERE key = ?").run(oldKey);
      }
      this.db.prepare(UPSERT_SQL).run(toParams(entry));
    });
    move();
  }

  async all(): Promise<SyncStateEntry[]> {
    return this.db
      .prepare<[], StateRow>("SELECT * FROM sync_state ORDER BY key")
      .all()
      .map(fromRow);
  }
}

/** Runs kept in `sync_runs`; older ones are pruned on every insert. */
export const RUN_HISTORY_LIMIT = 100;

export class SqliteSyncRunStore implements SyncRunStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly keep = RUN_HISTORY_LIMIT
  ) {}

  async record(report: SyncReport): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO sync_runs
         (id, direction, status, created, updated, skipped, failed, conflicts, started_at, duration_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const prune = this.db.prepare(
      `DELETE FROM sync_runs WHERE rowid NOT IN
         (SELECT rowid FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT ?)`
    );

    this.db.transaction(() => {
      insert.run(
        report.runId,
        report.direction,
        report.status,
        report.created,
        report.updated,
        report.skipped.length,
        report.failed.length,
        report.conflicts.length,
        report.startedAt.getTime(),
        report.durationMs
      );
      prune.run(this.keep);
    })();
  }

  async recent(limit: number): Promise<SyncRunSummary[]> {
    return this.db
      .prepare<[number], RunRow>(
        `SELECT id, direction, status, created, updated, skipped, failed, conflicts, started_at, duration_ms
         FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT ?`
      )
      .all(limit)
      .map((row) => ({
        id: row.id,
        direction: row.direction,
        status: row.status,
        created: row.created,
        updated: row.updated,
        skipped: row.skipped,
        failed: row.failed,
        conflicts: row.conflicts,
        startedAt: new Date(row.started_at),
        durationMs: row.duration_ms,
      }));
  }
}
