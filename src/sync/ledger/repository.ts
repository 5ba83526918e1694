import type Database from "better-sqlite3";
import type { Credential, SyncMode, SyncScope, SyncWatermark } from "@/sync/types";
import type { ExportedRecord, RunStatus, SyncRunRecord } from "./types";

// --- Credential slot ---

export interface CredentialSlot {
  load(): Credential | null;
  save(credential: Credential): void;
  clear(): void;
}

export class CredentialRepository implements CredentialSlot {
  constructor(private readonly db: Database.Database) {}

  load(): Credential | null {
    const row = this.db
      .prepare("SELECT access_token, refresh_token, expires_at FROM credentials WHERE slot = 1")
      .get() as RawCredentialRow | undefined;
    return row
      ? { accessToken: row.access_token, refreshToken: row.refresh_token, expiresAt: row.expires_at }
      : null;
  }

  save(credential: Credential): void {
    this.db.prepare(`
      INSERT INTO credentials (slot, access_token, refresh_token, expires_at, updated_at)
      VALUES (1, ?, ?, ?, ?)
      ON CONFLICT(slot) DO UPDATE SET
        access_token = excluded.access_token,
        refresh_token = excluded.refresh_token,
        expires_at = excluded.expires_at,
        updated_at = excluded.updated_at
    `).run(credential.accessToken, credential.refreshToken, credential.expiresAt, new Date().toISOString());
  }

  clear(): void {
    this.db.prepare("DELETE FROM credentials WHERE slot = 1").run();
  }
}

// --- Watermark + exported records ---

export class ExportLedgerRepository {
  constructor(private readonly db: Database.Database) {}

  readWatermark(): SyncWatermark | null {
    const row = this.db
      .prepare("SELECT last_synced_at FROM sync_watermark WHERE slot = 1")
      .get() as { last_synced_at: string } | undefined;
    return row ? { lastSyncedAt: row.last_synced_at } : null;
  }

  writeWatermark(lastSyncedAt: string, now: string): void {
    this.db.prepare(`
      INSERT INTO sync_watermark (slot, last_synced_at, updated_at)
      VALUES (1, ?, ?)
      ON CONFLICT(slot) DO UPDATE SET
        last_synced_at = excluded.last_synced_at,
        updated_at = excluded.updated_at
    `).run(lastSyncedAt, now);
  }

  findRecord(recordKey: string): ExportedRecord | undefined {
    const row = this.db
      .prepare("SELECT * FROM export_records WHERE record_key = ?")
      .get(recordKey) as RawExportRow | undefined;
    return row ? toExportedRecord(row) : undefined;
  }

  upsertRecord(record: ExportedRecord): void {
    this.db.prepare(`
      INSERT INTO export_records (record_key, data_hash, export_path, exported_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(record_key) DO UPDATE SET
        data_hash = excluded.data_hash,
        export_path = excluded.export_path,
        exported_at = excluded.exported_at
    `).run(record.recordKey, record.dataHash, record.exportPath, record.exportedAt);
  }

  countRecords(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS total FROM export_records").get() as { total: number };
    return row.total;
  }

  /** Runs `fn` inside one SQLite transaction; any throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

// --- Sync runs ---

export class RunRepository {
  constructor(private readonly db: Database.Database) {}

  createRun(runId: string, mode: SyncMode, dryRun: boolean, startedAt: string): void {
    this.db.prepare(`
      INSERT INTO sync_runs (run_id, started_at, mode, dry_run, status)
      VALUES (?, ?, ?, ?, ?)
    `).run(runId, startedAt, mode, dryRun ? 1 : 0, "running");
  }

  completeRun(
    runId: string,
    result: {
      status: Exclude<RunStatus, "running">;
      scope: SyncScope | null;
      recordCount: number;
      outputPath: string | null;
      errorCode?: string | null;
      errorMessage?: string | null;
      completedAt: string;
    },
  ): void {
    this.db.prepare(`
      UPDATE sync_runs
      SET completed_at = ?, scope = ?, record_count = ?, output_path = ?, status = ?, error_code = ?, error_message = ?
      WHERE run_id = ?
    `).run(
      result.completedAt,
      result.scope,
      result.recordCount,
      result.outputPath,
      result.status,
      result.errorCode ?? null,
      result.errorMessage ?? null,
      runId,
    );
  }

  listRecentRuns(limit = 10): SyncRunRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?")
      .all(limit) as RawRunRow[];
    return rows.map(toRunRecord);
  }
}

// --- Internal helpers ---

interface RawCredentialRow {
  access_token: string;
  refresh_token: string | null;
  expires_at: string;
}

interface RawExportRow {
  record_key: string;
  data_hash: string;
  export_path: string;
  exported_at: string;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  mode: SyncMode;
  scope: SyncScope | null;
  dry_run: number;
  record_count: number;
  output_path: string | null;
  status: RunStatus;
  error_code: string | null;
  error_message: string | null;
}

function toExportedRecord(row: RawExportRow): ExportedRecord {
  return {
    recordKey: row.record_key,
    dataHash: row.data_hash,
    exportPath: row.export_path,
    exportedAt: row.exported_at,
  };
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: row.mode,
    scope: row.scope,
    dryRun: row.dry_run === 1,
    recordCount: row.record_count,
    outputPath: row.output_path,
    status: row.status,
    errorCode: row.error_code,
    errorMessage: row.error_message,
  };
}
