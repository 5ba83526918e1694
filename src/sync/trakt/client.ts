import { z } from "zod";
import type { RatingIndex, WatchedRecord } from "@/sync/types";
import type { CredentialProvider } from "@/sync/auth/token-store";
import { type Clock, systemClock } from "@/sync/clock";
import {
  SourceUnavailableError,
  SyncCancelledError,
  TraktApiError,
  UnauthenticatedError,
  isSyncError,
} from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { DEFAULT_TRAKT_API_URL, buildUrl, readPagination, readRetryAfterMs, traktHeaders } from "./http";
import { mapHistoryItem, mapRatingItem, ratingKeys } from "./mappers";

const log = createChildLogger("trakt-client");

const DEFAULT_PAGE_LIMIT = 100;
const DEFAULT_MAX_RETRIES = 3;

const pageSchema = z.array(z.unknown());

export interface TraktClientOptions {
  clientId: string;
  baseUrl?: string;
  pageLimit?: number;
  /** Retries after the first attempt for 429 / 5xx / network errors */
  maxRetries?: number;
  clock?: Clock;
}

/** Where the engine gets its watch history from. */
export interface WatchHistorySource {
  fetchWatched(since: Date | null, signal?: AbortSignal): Promise<WatchedRecord[]>;
  fetchRatings(signal?: AbortSignal): Promise<RatingIndex>;
}

interface PageResponse {
  items: unknown[];
  pageCount: number;
}

/** Read-only Trakt client for movie history and ratings. */
export class TraktClient implements WatchHistorySource {
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly pageLimit: number;
  private readonly maxRetries: number;
  private readonly clock: Clock;

  constructor(
    private readonly credentials: CredentialProvider,
    options: TraktClientOptions,
  ) {
    this.clientId = options.clientId;
    this.baseUrl = options.baseUrl ?? DEFAULT_TRAKT_API_URL;
    this.pageLimit = options.pageLimit ?? DEFAULT_PAGE_LIMIT;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.clock = options.clock ?? systemClock;
  }

  /** Backoff when Trakt gives no Retry-After: 4s, 8s, 16s, ... */
  private backoffMs(attempt: number): number {
    return Math.pow(2, attempt + 2) * 1000;
  }

  /** Make an authenticated GET request, retrying rate limits and server errors. */
  private async requestPage(
    path: string,
    params: Record<string, string | undefined>,
    signal?: AbortSignal,
  ): Promise<PageResponse> {
    const url = buildUrl(this.baseUrl, path, params);

    for (let attempt = 0; ; attempt++) {
      const credential = await this.credentials.getValidCredential();

      log.debug("Trakt API request", { path, params, attempt });
      let response: Response;
      try {
        response = await fetch(url, {
          headers: traktHeaders(this.clientId, credential.accessToken),
          signal,
        });
      } catch (error) {
        if (signal?.aborted) {
          throw new SyncCancelledError("Sync run was cancelled during a Trakt request", {}, error);
        }
        await this.retryOrFail(path, attempt, null, signal, error);
        continue;
      }

      if (response.status === 401 || response.status === 403) {
        throw new UnauthenticatedError(`Trakt rejected the access token (${response.status})`, {
          status: response.status,
        });
      }

      if (response.status === 429 || response.status >= 500) {
        await this.retryOrFail(path, attempt, response, signal);
        continue;
      }

      if (!response.ok) {
        throw new TraktApiError(response.status, response.statusText, path);
      }

      const parsed = pageSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SourceUnavailableError(`Trakt returned an unexpected payload for ${path}`, { path });
      }

      const pagination = readPagination(response.headers, Number(params.page ?? 1));
      return { items: parsed.data, pageCount: pagination.pageCount };
    }
  }

  private async retryOrFail(
    path: string,
    attempt: number,
    response: Response | null,
    signal: AbortSignal | undefined,
    cause?: unknown,
  ): Promise<void> {
    const status = response?.status;
    if (attempt >= this.maxRetries) {
      throw new SourceUnavailableError(
        `Trakt unavailable after ${attempt + 1} attempts (${status ?? "network error"})`,
        { path, status, attempts: attempt + 1 },
        cause,
      );
    }

    const waitMs = (response && readRetryAfterMs(response.headers)) ?? this.backoffMs(attempt);
    log.warn(status === 429 ? "Rate limited by Trakt, backing off" : "Trakt request failed, retrying", {
      path,
      status,
      waitMs,
      attempt: attempt + 1,
      error: cause instanceof Error ? cause.message : undefined,
    });

    try {
      await this.clock.sleep(waitMs, signal);
    } catch (error) {
      throw new SyncCancelledError("Sync run was cancelled while waiting to retry", {}, error);
    }
  }

  /** Fetch all pages of a paginated endpoint, in page order. */
  private async fetchAllPages(
    path: string,
    params: Record<string, string | undefined>,
    signal?: AbortSignal,
  ): Promise<unknown[]> {
    const all: unknown[] = [];
    let page = 1;
    let pageCount = 1;

    do {
      const response = await this.requestPage(
        path,
        { ...params, page: String(page), limit: String(this.pageLimit) },
        signal,
      );
      all.push(...response.items);
      pageCount = response.pageCount;
      if (response.items.length === 0) break;
      page++;
    } while (page <= pageCount);

    return all;
  }

  // --- History ---

  async fetchWatched(since: Date | null, signal?: AbortSignal): Promise<WatchedRecord[]> {
    log.info("Fetching watched movies from Trakt", { since: since?.toISOString() ?? null });

    const raw = await this.fetchAllPages(
      "/sync/history/movies",
      { start_at: since?.toISOString() },
      signal,
    );

    const records: WatchedRecord[] = [];
    for (const item of raw) {
      const record = mapHistoryItem(item);
      if (record) {
        records.push(record);
      } else {
        log.warn("Skipping malformed history item", { item });
      }
    }

    log.info("Trakt history fetched", { items: raw.length, usable: records.length });
    return records;
  }

  // --- Ratings ---

  async fetchRatings(signal?: AbortSignal): Promise<RatingIndex> {
    log.info("Fetching movie ratings from Trakt");

    const raw = await this.fetchAllPages("/sync/ratings/movies", {}, signal);
    const index = new Map<string, number>();
    let skipped = 0;

    for (const item of raw) {
      const mapped = mapRatingItem(item);
      if (!mapped) {
        skipped++;
        continue;
      }
      for (const key of ratingKeys(mapped.movie)) {
        index.set(key, mapped.rating);
      }
    }

    if (skipped > 0) {
      log.warn("Skipped malformed rating items", { skipped });
    }
    log.info("Trakt ratings fetched", { items: raw.length, keys: index.size });
    return index;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.requestPage("/sync/history/movies", { page: "1", limit: "1" });
      log.info("Trakt API connection test successful");
      return true;
    } catch (error) {
      if (isSyncError(error) && error.category === "auth") throw error;
      log.error("Trakt API connection test failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
