/**
 * One product result retrieved from a single site.
 * Listings are never mutated after a connector produces them; scoring derives
 * a new object instead (see {@link ScoredListing}).
 */
export type Listing = Readonly<{
  name: string;
  price: number;
  rating: number;
  /** Search result URL on the originating site. */
  link: string;
  siteId: string;
}>;

/** Persisted shape of a listing inside a cache entry. */
export type CachedListingRecord = Readonly<{
  name: string;
  price: number;
  rating: number;
  link: string;
}>;

export type ScoredListing = Listing &
  Readonly<{
    normPrice: number;
    normRating: number;
    score: number;
  }>;
