import type { CanonicalRecord, SyncWatermark } from "@/sync/types";
import { recordKey } from "@/sync/reconcile/reconciler";
import { createChildLogger } from "@/sync/logger";
import { detectChanges } from "./change-detector";
import { hashRecord } from "./hash";
import type { ExportLedgerRepository } from "./repository";
import type { ChangeSet } from "./types";

const log = createChildLogger("sync-state");

export interface SyncCommit {
  /** Candidate watermark; never moves an existing one backwards */
  watermark: Date;
  records: CanonicalRecord[];
  exportPath: string;
  committedAt: Date;
}

/**
 * Watermark and exported-record ledger. The engine is the only writer, and it
 * writes once per run, after the export file is in place.
 */
export class SyncState {
  constructor(private readonly ledger: ExportLedgerRepository) {}

  readWatermark(): SyncWatermark | null {
    return this.ledger.readWatermark();
  }

  detectChanges(records: CanonicalRecord[]): ChangeSet<CanonicalRecord> {
    return detectChanges(records, (key) => this.ledger.findRecord(key));
  }

  /** Advance the watermark and record every exported row in a single transaction. */
  commit(commit: SyncCommit): SyncWatermark {
    return this.ledger.transaction(() => {
      const previous = this.ledger.readWatermark();
      const candidate = commit.watermark.toISOString();
      const lastSyncedAt =
        previous && Date.parse(previous.lastSyncedAt) > commit.watermark.getTime()
          ? previous.lastSyncedAt
          : candidate;

      const committedAt = commit.committedAt.toISOString();
      this.ledger.writeWatermark(lastSyncedAt, committedAt);
      for (const record of commit.records) {
        this.ledger.upsertRecord({
          recordKey: recordKey(record),
          dataHash: hashRecord(record),
          exportPath: commit.exportPath,
          exportedAt: committedAt,
        });
      }

      log.info("Sync state committed", {
        watermark: lastSyncedAt,
        previous: previous?.lastSyncedAt ?? null,
        records: commit.records.length,
      });
      return { lastSyncedAt };
    });
  }
}
