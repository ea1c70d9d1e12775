import type { Listing, ScoredListing } from './listing.js';

export type NormalizerMode = 'structured' | 'refine';

/** Structured reading of a free-text part request. */
export interface PartQuery {
  readonly partType: string;
  readonly vehicleModel: string;
  readonly priceRange: readonly [number, number];
}

export interface SiteAggregationStats {
  siteId: string;
  status: 'ok' | 'failed';
  listings: number;
  durationMs: number;
  error?: string;
}

export interface AggregationResult {
  normalizedQuery: string;
  listings: readonly Listing[];
  sites: readonly SiteAggregationStats[];
}

export interface SearchOutcome {
  rawQuery: string;
  normalizedQuery: string;
  listings: readonly Listing[];
  optimal: ScoredListing | null;
  completedAt: Date;
}
