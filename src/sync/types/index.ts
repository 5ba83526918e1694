export type SyncMode = "incremental" | "full";

/** What a run actually covered. Incremental without a watermark becomes full. */
export type SyncScope = "incremental" | "full";

export type SyncPhase =
  | "idle"
  | "fetchingCredential"
  | "fetchingRecords"
  | "reconciling"
  | "writing"
  | "completed"
  | "errored";

export interface Credential {
  accessToken: string;
  refreshToken: string | null;
  /** ISO 8601, UTC */
  expiresAt: string;
}

export interface CredentialStatus {
  authenticated: boolean;
  expiresAt: string | null;
  canRefresh: boolean;
}

/** One watch event as Trakt reported it. */
export type WatchedRecord = Readonly<{
  title: string;
  year: number | null;
  imdbId?: string;
  tmdbId?: string;
  watchedAt: string;
  sourceRating?: number;
  historyId?: number;
}>;

/** Lookup keys: `imdb:<id>`, `tmdb:<id>`, `title:<lowercased title>|<year>`. */
export type RatingIndex = ReadonlyMap<string, number>;

export interface CanonicalRecord {
  title: string;
  year: number | null;
  imdbId?: string;
  tmdbId?: string;
  /** YYYY-MM-DD */
  watchedDate: string;
  /** 0.5 – 5.0 in 0.5 steps */
  rating?: number;
  /** Instant of the watch event this row came from */
  watchedAt: string;
}

export interface SyncWatermark {
  lastSyncedAt: string;
}

export interface ExportBatch {
  records: CanonicalRecord[];
  generatedAt: string;
  scope: SyncScope;
}

export interface ExportResult {
  outputPath: string;
  bytes: number;
  rowCount: number;
}

export interface ExportInfo {
  filename: string;
  path: string;
  size: number;
  modifiedAt: string;
}

export interface ExportValidation {
  valid: boolean;
  rowCount: number;
  errors: string[];
  warnings: string[];
}

export interface SyncRunCounts {
  fetched: number;
  new: number;
  changed: number;
  unchanged: number;
}

export interface SyncRunSummary {
  runId: string;
  mode: SyncMode;
  scope: SyncScope;
  dryRun: boolean;
  /** Rows in the export (or that would be, on a dry run) */
  count: number;
  outputPath: string | null;
  bytes: number;
  exceedsSizeLimit: boolean;
  /** Watermark in effect after the run */
  watermark: string | null;
  counts: SyncRunCounts;
  startedAt: string;
  completedAt: string;
}
