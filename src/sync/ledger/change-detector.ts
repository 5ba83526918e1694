import type { CanonicalRecord } from "@/sync/types";
import { recordKey } from "@/sync/reconcile/reconciler";
import { hashRecord } from "./hash";
import type { ChangeSet, ExportedRecord } from "./types";

/**
 * Split reconciled records by what the ledger already holds:
 * never exported, exported with different columns, or exported as-is.
 */
export function detectChanges(
  records: CanonicalRecord[],
  findRecord: (recordKey: string) => ExportedRecord | undefined,
): ChangeSet<CanonicalRecord> {
  const result: ChangeSet<CanonicalRecord> = { new: [], changed: [], unchanged: [] };

  for (const record of records) {
    const existing = findRecord(recordKey(record));

    if (!existing) {
      result.new.push(record);
    } else if (existing.dataHash !== hashRecord(record)) {
      result.changed.push(record);
    } else {
      result.unchanged.push(record);
    }
  }

  return result;
}
