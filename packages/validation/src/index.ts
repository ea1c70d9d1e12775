export { PartQueryExtractionSchema, DEFAULT_PRICE_RANGE } from './part-query.js';
export type { PartQueryExtraction } from './part-query.js';
export { CachedListingRecordSchema, CachedListingRecordsSchema } from './listing.js';
export type { CachedListingRecordInput } from './listing.js';
