import type { SyncMode, SyncScope } from "@/sync/types";

export type RunStatus = "running" | "completed" | "failed";

export interface ExportedRecord {
  recordKey: string;
  dataHash: string;
  exportPath: string;
  exportedAt: string;
}

export interface SyncRunRecord {
  id: number;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  mode: SyncMode;
  scope: SyncScope | null;
  dryRun: boolean;
  recordCount: number;
  outputPath: string | null;
  status: RunStatus;
  errorCode: string | null;
  errorMessage: string | null;
}

export interface ChangeSet<T> {
  new: T[];
  changed: T[];
  unchanged: T[];
}
