import { describe, it, expect } from "vitest";
import { mapHistoryItem, mapRatingItem, movieKeys, titleYearKey } from "../mappers";

describe("mapHistoryItem", () => {
  it("maps a movie watch", () => {
    expect(
      mapHistoryItem({
        id: 1001,
        watched_at: "2024-01-05T21:30:00.000+01:00",
        action: "watch",
        type: "movie",
        movie: { title: " Arrival ", year: 2016, ids: { trakt: 1, imdb: "tt2543164", tmdb: 329865 } },
      }),
    ).toEqual({
      title: "Arrival",
      year: 2016,
      imdbId: "tt2543164",
      tmdbId: "329865",
      watchedAt: "2024-01-05T20:30:00.000Z",
      historyId: 1001,
    });
  });

  it("keeps movies with missing metadata", () => {
    expect(
      mapHistoryItem({
        watched_at: "2024-01-05T20:00:00Z",
        type: "movie",
        movie: { title: null, year: null, ids: { imdb: null, tmdb: 550 } },
      }),
    ).toEqual({
      title: "",
      year: null,
      imdbId: undefined,
      tmdbId: "550",
      watchedAt: "2024-01-05T20:00:00.000Z",
      historyId: undefined,
    });
  });

  it("rejects non-movie and malformed items", () => {
    expect(mapHistoryItem({ watched_at: "2024-01-05T20:00:00Z", type: "episode", movie: { ids: {} } })).toBeNull();
    expect(mapHistoryItem({ watched_at: "yesterday", type: "movie", movie: { ids: {} } })).toBeNull();
    expect(mapHistoryItem(null)).toBeNull();
  });
});

describe("mapRatingItem", () => {
  it("accepts ratings from 1 to 10 only", () => {
    const movie = { title: "Heat", year: 1995, ids: { imdb: "tt0113277" } };
    expect(mapRatingItem({ rating: 10, type: "movie", movie })).toEqual({ rating: 10, movie });
    expect(mapRatingItem({ rating: 0, type: "movie", movie })).toBeNull();
  });
});

describe("titleYearKey", () => {
  it("normalizes case and whitespace", () => {
    expect(titleYearKey("  The Thing ", 1982)).toBe("title:the thing|1982");
  });

  it("returns null for an empty title", () => {
    expect(titleYearKey("   ", 1982)).toBeNull();
  });
});

describe("movieKeys", () => {
  it("lists the strongest identifier first", () => {
    expect(movieKeys({ title: "Heat", year: 1995, imdbId: "tt0113277", tmdbId: "949" })).toEqual([
      "imdb:tt0113277",
      "tmdb:949",
      "title:heat|1995",
    ]);
  });
});
