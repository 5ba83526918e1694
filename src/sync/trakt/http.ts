import type { TraktPagination } from "./types";

export const DEFAULT_TRAKT_API_URL = "https://api.trakt.tv";
export const TRAKT_API_VERSION = "2";

export function traktHeaders(clientId: string, accessToken?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
    "trakt-api-version": TRAKT_API_VERSION,
    "trakt-api-key": clientId,
  };
  if (accessToken) headers.Authorization = `Bearer ${accessToken}`;
  return headers;
}

export function buildUrl(baseUrl: string, path: string, params?: Record<string, string | undefined>): string {
  const url = new URL(path, baseUrl);
  if (params) {
    Object.entries(params).forEach(([k, v]) => {
      if (v !== undefined && v !== "") url.searchParams.set(k, v);
    });
  }
  return url.toString();
}

/** Reads Trakt's X-Pagination-* headers. Missing headers mean a single page. */
export function readPagination(headers: Headers, requestedPage: number): TraktPagination {
  const page = Number.parseInt(headers.get("x-pagination-page") ?? "", 10);
  const pageCount = Number.parseInt(headers.get("x-pagination-page-count") ?? "", 10);
  return {
    page: Number.isFinite(page) ? page : requestedPage,
    pageCount: Number.isFinite(pageCount) ? pageCount : requestedPage,
  };
}

/** Retry-After in seconds; Trakt does not send the HTTP-date form. */
export function readRetryAfterMs(headers: Headers): number | null {
  const raw = headers.get("retry-after");
  if (!raw) return null;
  const seconds = Number.parseFloat(raw);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return Math.ceil(seconds * 1000);
}
