import { randomUUID } from "crypto";
import type {
  CanonicalRecord,
  ExportResult,
  SyncMode,
  SyncPhase,
  SyncRunCounts,
  SyncRunSummary,
  SyncScope,
} from "@/sync/types";
import type { CredentialProvider } from "@/sync/auth/token-store";
import type { WatchHistorySource } from "@/sync/trakt/client";
import type { SyncState } from "@/sync/ledger/sync-state";
import type { RunRepository } from "@/sync/ledger/repository";
import { EXPORT_SIZE_LIMIT_BYTES, type ExportWriter } from "@/sync/export/writer";
import { reconcile } from "@/sync/reconcile/reconciler";
import { type Clock, systemClock } from "@/sync/clock";
import { SyncAlreadyRunningError, SyncCancelledError, describeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("sync-engine");

export interface SyncEngineDeps {
  tokens: CredentialProvider;
  source: WatchHistorySource;
  state: SyncState;
  writer: Pick<ExportWriter, "write">;
  runs?: RunRepository;
  clock?: Clock;
  /** Subtracted from the newest exported watch time when advancing the watermark */
  clockSkewMs?: number;
}

export interface RunOptions {
  dryRun?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function ensureActive(signal: AbortSignal | undefined, phase: SyncPhase): void {
  if (signal?.aborted) {
    throw new SyncCancelledError(`Sync run was cancelled while ${phase}`, { reason: String(signal.reason) });
  }
}

function latestWatchedAt(records: CanonicalRecord[]): number {
  return records.reduce((max, record) => Math.max(max, Date.parse(record.watchedAt)), Number.NEGATIVE_INFINITY);
}

/**
 * Runs one Trakt → Letterboxd export at a time:
 * idle → fetchingCredential → fetchingRecords → reconciling → writing → completed,
 * or errored from any of them. Persisted state only changes after the export
 * file has been committed.
 */
export class SyncEngine {
  private readonly clock: Clock;
  private readonly clockSkewMs: number;
  private running = false;
  private currentPhase: SyncPhase = "idle";

  constructor(private readonly deps: SyncEngineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.clockSkewMs = deps.clockSkewMs ?? 0;
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(mode: SyncMode, options: RunOptions = {}): Promise<SyncRunSummary> {
    if (this.running) {
      log.warn("Rejected sync run: another run is in progress", { mode, phase: this.currentPhase });
      throw new SyncAlreadyRunningError({ phase: this.currentPhase });
    }
    this.running = true;

    const runId = randomUUID();
    const dryRun = options.dryRun ?? false;
    let scope: SyncScope | null = null;

    try {
      const startedAt = this.clock.now().toISOString();
      const signals = [options.signal, options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined].filter(
        (s): s is AbortSignal => s !== undefined,
      );
      const signal = signals.length > 0 ? AbortSignal.any(signals) : undefined;

      log.info("Starting sync run", { runId, mode, dryRun });
      this.recordHistory(runId, "start", (runs) => runs.createRun(runId, mode, dryRun, startedAt));

      const summary = await this.execute(runId, mode, dryRun, startedAt, signal, (s) => {
        scope = s;
      });
      this.currentPhase = "completed";
      this.recordHistory(runId, "completion", (runs) =>
        runs.completeRun(runId, {
          status: "completed",
          scope: summary.scope,
          recordCount: summary.count,
          outputPath: summary.outputPath,
          completedAt: summary.completedAt,
        }),
      );
      log.info("Sync run complete", {
        runId,
        scope: summary.scope,
        count: summary.count,
        outputPath: summary.outputPath,
        watermark: summary.watermark,
      });
      return summary;
    } catch (error) {
      const failedIn = this.currentPhase;
      this.currentPhase = "errored";
      const described = describeError(error);
      log.error("Sync run failed", {
        runId,
        phase: failedIn,
        code: described.code,
        category: described.category,
        error: described.message,
      });
      this.recordHistory(runId, "failure", (runs) =>
        runs.completeRun(runId, {
          status: "failed",
          scope,
          recordCount: 0,
          outputPath: null,
          errorCode: described.code,
          errorMessage: described.message,
          completedAt: this.clock.now().toISOString(),
        }),
      );
      throw error;
    } finally {
      this.running = false;
    }
  }

  /** Write to the run history; a failed write is logged and does not change the run's result. */
  private recordHistory(runId: string, step: string, write: (runs: RunRepository) => void): void {
    if (!this.deps.runs) return;
    try {
      write(this.deps.runs);
    } catch (error) {
      log.warn("Could not record sync run history", {
        runId,
        step,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async execute(
    runId: string,
    mode: SyncMode,
    dryRun: boolean,
    startedAt: string,
    signal: AbortSignal | undefined,
    onScope: (scope: SyncScope) => void,
  ): Promise<SyncRunSummary> {
    // Step 1: Make sure we can talk to Trakt before anything else
    this.currentPhase = "fetchingCredential";
    ensureActive(signal, this.currentPhase);
    await this.deps.tokens.getValidCredential();

    // Step 2: Decide the scope and fetch
    this.currentPhase = "fetchingRecords";
    ensureActive(signal, this.currentPhase);
    const existing = this.deps.state.readWatermark();
    const watermark = mode === "incremental" ? existing : null;
    const scope: SyncScope = watermark ? "incremental" : "full";
    onScope(scope);
    if (mode === "incremental" && !watermark) {
      log.info("No watermark yet, running a full sync", { runId });
    }
    const since = watermark ? new Date(watermark.lastSyncedAt) : null;

    const watched = await this.deps.source.fetchWatched(since, signal);
    ensureActive(signal, this.currentPhase);
    const ratings = await this.deps.source.fetchRatings(signal);

    // Step 3: Reconcile, then drop rows already exported unchanged
    this.currentPhase = "reconciling";
    ensureActive(signal, this.currentPhase);
    const reconciled = reconcile(watched, ratings);
    const changes = this.deps.state.detectChanges(reconciled);
    const unchanged = new Set(changes.unchanged);
    const records = scope === "incremental" ? reconciled.filter((record) => !unchanged.has(record)) : reconciled;

    const counts: SyncRunCounts = {
      fetched: watched.length,
      new: changes.new.length,
      changed: changes.changed.length,
      unchanged: changes.unchanged.length,
    };
    log.info("Watch history reconciled", { runId, scope, ...counts, exporting: records.length });

    const summaryBase = {
      runId,
      mode,
      scope,
      dryRun,
      count: records.length,
      counts,
      startedAt,
    };

    if (records.length === 0) {
      log.info("Nothing new to export", { runId, scope });
      return this.finish(summaryBase, null, existing?.lastSyncedAt ?? null);
    }

    if (dryRun) {
      log.info("Dry run — skipping export and state update", { runId, records: records.length });
      return this.finish(summaryBase, null, existing?.lastSyncedAt ?? null);
    }

    // Step 4: Write the file, then and only then move the watermark
    this.currentPhase = "writing";
    ensureActive(signal, this.currentPhase);
    const generatedAt = this.clock.now();
    const result = await this.deps.writer.write({ records, generatedAt: generatedAt.toISOString(), scope });

    try {
      ensureActive(signal, this.currentPhase);
    } catch (error) {
      log.warn("Run cancelled after the export was written; watermark left as it was", {
        runId,
        outputPath: result.outputPath,
      });
      throw error;
    }

    const committed = this.deps.state.commit({
      watermark: new Date(latestWatchedAt(records) - this.clockSkewMs),
      records,
      exportPath: result.outputPath,
      committedAt: generatedAt,
    });

    return this.finish(summaryBase, result, committed.lastSyncedAt);
  }

  private finish(
    base: Omit<SyncRunSummary, "outputPath" | "bytes" | "exceedsSizeLimit" | "watermark" | "completedAt">,
    result: ExportResult | null,
    watermark: string | null,
  ): SyncRunSummary {
    const bytes = result?.bytes ?? 0;
    return {
      ...base,
      outputPath: result?.outputPath ?? null,
      bytes,
      exceedsSizeLimit: bytes > EXPORT_SIZE_LIMIT_BYTES,
      watermark,
      completedAt: this.clock.now().toISOString(),
    };
  }
}
