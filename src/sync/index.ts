import path from "path";
import type Database from "better-sqlite3";
import type { CredentialStatus, ExportInfo, SyncPhase, SyncWatermark } from "@/sync/types";
import { getEnv, type SyncEnv } from "@/sync/config/env";
import { getDatabase } from "@/sync/ledger/db";
import { CredentialRepository, ExportLedgerRepository, RunRepository } from "@/sync/ledger/repository";
import { SyncState } from "@/sync/ledger/sync-state";
import type { SyncRunRecord } from "@/sync/ledger/types";
import { traktCredentialsSchema } from "@/sync/types/api";
import { TraktOAuthApi } from "@/sync/trakt/oauth";
import { TraktClient } from "@/sync/trakt/client";
import { TokenStore } from "@/sync/auth/token-store";
import { DeviceAuthFlow } from "@/sync/auth/device-flow";
import { ExportWriter } from "@/sync/export/writer";
import { SyncEngine } from "@/sync/engine";
import { type Clock, systemClock } from "@/sync/clock";

export interface SyncServices {
  engine: SyncEngine;
  tokens: TokenStore;
  authFlow: DeviceAuthFlow;
  source: TraktClient;
  state: SyncState;
  writer: ExportWriter;
  runs: RunRepository;
}

export interface SyncStatus {
  phase: SyncPhase;
  running: boolean;
  auth: CredentialStatus;
  watermark: SyncWatermark | null;
  recentRuns: SyncRunRecord[];
  recentExports: ExportInfo[];
}

/** Wire the sync core from configuration. Every collaborator is explicit. */
export function createSyncServices(
  env: SyncEnv,
  db: Database.Database,
  clock: Clock = systemClock,
): SyncServices {
  const credentials = traktCredentialsSchema.parse({
    clientId: env.TRAKT_CLIENT_ID,
    clientSecret: env.TRAKT_CLIENT_SECRET,
    apiUrl: env.TRAKT_API_URL,
  });

  const oauth = new TraktOAuthApi(credentials);
  const tokens = new TokenStore(new CredentialRepository(db), oauth, { clock });
  const authFlow = new DeviceAuthFlow(oauth, tokens, clock);
  const source = new TraktClient(tokens, {
    clientId: env.TRAKT_CLIENT_ID,
    baseUrl: env.TRAKT_API_URL,
    pageLimit: env.SYNC_PAGE_LIMIT,
    maxRetries: env.SYNC_MAX_RETRIES,
    clock,
  });
  const state = new SyncState(new ExportLedgerRepository(db));
  const writer = new ExportWriter(path.resolve(env.SYNC_EXPORT_PATH));
  const runs = new RunRepository(db);

  const engine = new SyncEngine({
    tokens,
    source,
    state,
    writer,
    runs,
    clock,
    clockSkewMs: env.SYNC_CLOCK_SKEW_SECONDS * 1000,
  });

  return { engine, tokens, authFlow, source, state, writer, runs };
}

let _services: SyncServices | null = null;

/** Process-wide services, so the one-run-at-a-time guard covers every caller. */
export function getSyncServices(): SyncServices {
  if (!_services) {
    _services = createSyncServices(getEnv(), getDatabase());
  }
  return _services;
}

export async function getSyncStatus(services: SyncServices): Promise<SyncStatus> {
  return {
    phase: services.engine.phase,
    running: services.engine.isRunning,
    auth: services.tokens.status(),
    watermark: services.state.readWatermark(),
    recentRuns: services.runs.listRecentRuns(5),
    recentExports: await services.writer.listExports(5),
  };
}
