import { createHash } from "crypto";
import type { CanonicalRecord } from "@/sync/types";

/**
 * Hash the exported columns of a record for change detection.
 * `watchedAt` is left out: two watch events on the same day produce the same row.
 */
export function hashRecord(record: CanonicalRecord): string {
  const { watchedAt, ...relevant } = record;
  const sorted = stableSortKeys(relevant);
  return createHash("sha256").update(JSON.stringify(sorted)).digest("hex");
}

function stableSortKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(obj).sort()) {
    const val = obj[key];
    sorted[key] = val ?? null;
  }
  return sorted;
}
