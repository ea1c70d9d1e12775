export type { Listing, CachedListingRecord, ScoredListing } from './listing.js';
export type {
  NormalizerMode,
  PartQuery,
  AggregationResult,
  SiteAggregationStats,
  SearchOutcome,
} from './search.js';
