export const OTEL_ATTR = {
  SEARCH_RAW_QUERY_LENGTH: 'search.raw_query.length',
  SEARCH_NORMALIZED_QUERY: 'search.normalized_query',
  SEARCH_SITE_COUNT: 'search.site_count',
  SEARCH_LISTING_COUNT: 'search.listing_count',

  SITE_ID: 'site.id',
  SITE_CACHE_HIT: 'site.cache_hit',

  LLM_PROVIDER: 'llm.provider',
  LLM_MODEL: 'llm.model',
  LLM_MODE: 'llm.mode',
} as const;

export type OtelAttrKey = (typeof OTEL_ATTR)[keyof typeof OTEL_ATTR];
