import type { Listing, ScoredListing } from '@partscout/types';

/** Keeps the normalization defined when every value in a column is equal. */
export const SCORE_EPSILON = 1e-6;
export const PRICE_WEIGHT = 0.6;
export const RATING_WEIGHT = 0.4;

type Bounds = Readonly<{ min: number; max: number }>;

function boundsOf(values: readonly number[]): Bounds {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

function normalize(value: number, bounds: Bounds): number {
  return (value - bounds.min) / (bounds.max - bounds.min + SCORE_EPSILON);
}

/**
 * Min-max normalizes price and rating across the table and scores each
 * listing; cheaper and better rated scores higher. Output order matches input.
 */
export function scoreListings(listings: readonly Listing[]): ScoredListing[] {
  if (listings.length === 0) return [];

  const price = boundsOf(listings.map((listing) => listing.price));
  const rating = boundsOf(listings.map((listing) => listing.rating));

  return listings.map((listing) => {
    const normPrice = normalize(listing.price, price);
    const normRating = normalize(listing.rating, rating);
    return {
      ...listing,
      normPrice,
      normRating,
      score: (1 - normPrice) * PRICE_WEIGHT + normRating * RATING_WEIGHT,
    };
  });
}

/** Highest score wins; on a tie the earliest listing is kept. */
export function selectOptimal(listings: readonly Listing[]): ScoredListing | null {
  let best: ScoredListing | null = null;
  for (const candidate of scoreListings(listings)) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best;
}
