/**
 * Trakt rates 1–10 in whole points, Letterboxd 0.5–5.0 in half stars.
 * The map is linear (1 → 0.5, 10 → 5.0) and rounds half-up to the nearest
 * half star. It cannot be reversed: Letterboxd has no 10-point rating.
 */
export function convertRating(sourceRating: number | null | undefined): number | null {
  if (sourceRating === null || sourceRating === undefined) return null;
  if (!Number.isInteger(sourceRating) || sourceRating < 1 || sourceRating > 10) {
    throw new RangeError(`Trakt rating must be an integer from 1 to 10, got ${sourceRating}`);
  }

  const scaled = 0.5 + ((sourceRating - 1) * (5.0 - 0.5)) / (10 - 1);
  return Math.floor(scaled * 2 + 0.5) / 2;
}
