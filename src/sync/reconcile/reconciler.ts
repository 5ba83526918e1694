import type { CanonicalRecord, RatingIndex, WatchedRecord } from "@/sync/types";
import { movieKeys, titleYearKey } from "@/sync/trakt/mappers";
import { createChildLogger } from "@/sync/logger";
import { convertRating } from "./rating";

const log = createChildLogger("reconciler");

type Identified = Pick<CanonicalRecord, "title" | "year" | "imdbId" | "tmdbId">;

/** imdb, then tmdb, then title+year. Null when the record carries none of them. */
export function identityKey(record: Identified): string | null {
  if (record.imdbId) return `imdb:${record.imdbId}`;
  if (record.tmdbId) return `tmdb:${record.tmdbId}`;
  return titleYearKey(record.title, record.year);
}

/** One exported row per film per day. */
export function recordKey(record: Identified & Pick<CanonicalRecord, "watchedDate">): string {
  return `${identityKey(record) ?? "unknown"}@${record.watchedDate}`;
}

function toWatchedDate(watchedAt: string): string {
  return new Date(watchedAt).toISOString().slice(0, 10);
}

function lookupRating(record: WatchedRecord, ratings: RatingIndex): number | undefined {
  for (const key of movieKeys(record)) {
    const rating = ratings.get(key);
    if (rating !== undefined) return rating;
  }
  return record.sourceRating;
}

/**
 * Turn raw watch events into export rows: attach ratings, drop events with no
 * identifier, collapse repeats of a film on one day (the later event wins) and
 * sort by watch date, keeping fetch order within a day.
 */
export function reconcile(watched: readonly WatchedRecord[], ratings: RatingIndex): CanonicalRecord[] {
  const kept = new Map<string, { record: CanonicalRecord; order: number }>();
  let dropped = 0;

  watched.forEach((item, order) => {
    const identity = identityKey(item);
    if (!identity) {
      dropped++;
      log.warn("Dropping watch event without title or identifiers", {
        watchedAt: item.watchedAt,
        historyId: item.historyId,
      });
      return;
    }

    const rating = convertRating(lookupRating(item, ratings));
    const record: CanonicalRecord = {
      title: item.title,
      year: item.year,
      imdbId: item.imdbId,
      tmdbId: item.tmdbId,
      watchedDate: toWatchedDate(item.watchedAt),
      watchedAt: item.watchedAt,
    };
    if (rating !== null) record.rating = rating;

    const key = `${identity}@${record.watchedDate}`;
    if (kept.has(key)) {
      log.debug("Duplicate watch event, keeping the later one", { key });
    }
    kept.set(key, { record, order });
  });

  const records = [...kept.values()]
    .sort((a, b) => a.record.watchedDate.localeCompare(b.record.watchedDate) || a.order - b.order)
    .map((entry) => entry.record);

  log.debug("Reconciled watch history", { input: watched.length, output: records.length, dropped });
  return records;
}
