import type { WatchedRecord } from "@/sync/types";
import { traktHistoryItemSchema, traktRatingItemSchema, type TraktMovie } from "./types";

export interface MappedRating {
  movie: TraktMovie;
  rating: number;
}

/** Returns null for items that are not a usable movie watch event. */
export function mapHistoryItem(raw: unknown): WatchedRecord | null {
  const parsed = traktHistoryItemSchema.safeParse(raw);
  if (!parsed.success) return null;

  const item = parsed.data;
  const { movie } = item;
  return {
    title: movie.title?.trim() ?? "",
    year: movie.year ?? null,
    imdbId: movie.ids.imdb || undefined,
    tmdbId: movie.ids.tmdb != null ? String(movie.ids.tmdb) : undefined,
    watchedAt: new Date(item.watched_at).toISOString(),
    historyId: item.id,
  };
}

export function mapRatingItem(raw: unknown): MappedRating | null {
  const parsed = traktRatingItemSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { movie: parsed.data.movie, rating: parsed.data.rating };
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export function titleYearKey(title: string, year: number | null | undefined): string | null {
  const normalized = normalizeTitle(title);
  if (!normalized) return null;
  return `title:${normalized}|${year ?? ""}`;
}

/**
 * Lookup keys for a movie, strongest identifier first.
 * The order is the order ratings are matched in.
 */
export function movieKeys(movie: {
  title?: string | null;
  year?: number | null;
  imdbId?: string | null;
  tmdbId?: string | null;
}): string[] {
  const keys: string[] = [];
  if (movie.imdbId) keys.push(`imdb:${movie.imdbId}`);
  if (movie.tmdbId) keys.push(`tmdb:${movie.tmdbId}`);
  const titleKey = titleYearKey(movie.title ?? "", movie.year);
  if (titleKey) keys.push(titleKey);
  return keys;
}

export function ratingKeys(movie: TraktMovie): string[] {
  return movieKeys({
    title: movie.title,
    year: movie.year,
    imdbId: movie.ids.imdb,
    tmdbId: movie.ids.tmdb != null ? String(movie.ids.tmdb) : null,
  });
}
