export { Aggregator, DEFAULT_SITE_TIMEOUT_MS } from './aggregator.js';
export type { AggregatorOptions, SearchQueryNormalizer } from './aggregator.js';
export {
  scoreListings,
  selectOptimal,
  SCORE_EPSILON,
  PRICE_WEIGHT,
  RATING_WEIGHT,
} from './ranker.js';
export { SearchSession } from './session.js';
export type { ListingAggregator } from './session.js';
export { toCsv, DEFAULT_EXPORT_FILENAME } from './export.js';
export { SiteTimeoutError } from './errors.js';
