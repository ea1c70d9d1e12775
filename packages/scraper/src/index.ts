export {
  SUPPORTED_SITES,
  buildSearchUrl,
  encodeQueryComponent,
  isSupportedSite,
  findSitesWithoutTemplate,
  assertRegistryComplete,
} from './sites/registry.js';
export type { SupportedSite } from './sites/registry.js';

export type { SiteConnector, ConnectorKind, ConnectorFetchOptions } from './connectors/types.js';
export { SiteFetchError } from './connectors/errors.js';
export {
  SyntheticConnector,
  SYNTHETIC_PRICE_RANGE,
  SYNTHETIC_RATING_RANGE,
} from './connectors/synthetic.js';
export type { RandomSource } from './connectors/synthetic.js';
export { StaticConnector } from './connectors/static.js';
export type { StaticListingSeed } from './connectors/static.js';
export { HttpConnector } from './connectors/http.js';
export type { HttpConnectorOptions } from './connectors/http.js';

export { ResultCache } from './cache/result-cache.js';
export type { ResultCacheOptions, CacheLookup } from './cache/result-cache.js';
export { CacheIoError } from './cache/store.js';
export type { CacheStore } from './cache/store.js';
export { FileCacheStore, DEFAULT_CACHE_DIR } from './cache/file-store.js';
export { RedisCacheStore, DEFAULT_REDIS_CACHE_PREFIX } from './cache/redis-store.js';
export type { RedisCacheClient } from './cache/redis-store.js';
export { MemoryCacheStore } from './cache/memory-store.js';
export { toCachedRecords, fromCachedRecords, parseCachedRecords } from './cache/records.js';

export { buildCacheKey } from './utils/content-hash.js';
export { extractJsonLd, jsonLdToListings } from './utils/json-ld-extractor.js';
export type { JsonLdNode } from './utils/json-ld-extractor.js';
export { SimpleHtmlFetcher } from './utils/html-fetcher.js';
export type { HtmlContentProvider, HtmlFetchResult } from './utils/html-fetcher.js';
export { TokenBucketRateLimiter, getDomain } from './utils/rate-limiter.js';
