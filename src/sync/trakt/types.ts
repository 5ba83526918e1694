// Raw API response shapes from the Trakt API
// Docs: https://trakt.docs.apiary.io
import { z } from "zod";

export const traktMovieIdsSchema = z.object({
  trakt: z.number().int().optional(),
  slug: z.string().optional(),
  imdb: z.string().nullish(),
  tmdb: z.number().int().nullish(),
});

export const traktMovieSchema = z.object({
  title: z.string().nullish(),
  year: z.number().int().nullish(),
  ids: traktMovieIdsSchema,
});

export const traktHistoryItemSchema = z.object({
  id: z.number().int().optional(),
  watched_at: z.string().datetime({ offset: true }),
  action: z.string().optional(),
  type: z.literal("movie"),
  movie: traktMovieSchema,
});

export const traktRatingItemSchema = z.object({
  rated_at: z.string().optional(),
  rating: z.number().int().min(1).max(10),
  type: z.literal("movie"),
  movie: traktMovieSchema,
});

export const traktDeviceCodeSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_url: z.string().min(1),
  expires_in: z.number().positive(),
  interval: z.number().positive(),
});

export const traktTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
  created_at: z.number().int(),
});

export type TraktMovieIds = z.infer<typeof traktMovieIdsSchema>;
export type TraktMovie = z.infer<typeof traktMovieSchema>;
export type TraktHistoryItem = z.infer<typeof traktHistoryItemSchema>;
export type TraktRatingItem = z.infer<typeof traktRatingItemSchema>;
export type TraktDeviceCode = z.infer<typeof traktDeviceCodeSchema>;
export type TraktToken = z.infer<typeof traktTokenSchema>;

export interface TraktPagination {
  page: number;
  pageCount: number;
}
