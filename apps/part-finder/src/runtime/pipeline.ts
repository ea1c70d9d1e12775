import { Redis } from 'ioredis';

import {
  QueryNormalizer,
  createLanguageModelClient,
  type LanguageModelClient,
} from '@partscout/ai-engine';
import type { AppEnv } from '@partscout/config';
import type { Logger } from '@partscout/logger';
import {
  FileCacheStore,
  HttpConnector,
  RedisCacheStore,
  ResultCache,
  SUPPORTED_SITES,
  SyntheticConnector,
  assertRegistryComplete,
  findSitesWithoutTemplate,
  type CacheStore,
  type SiteConnector,
} from '@partscout/scraper';
import { Aggregator, SearchSession } from '@partscout/search';

/** Replacements for the env-selected components (tests, embedding). */
export type PipelineOverrides = Readonly<{
  languageModel?: LanguageModelClient;
  connector?: SiteConnector;
  cacheStore?: CacheStore;
}>;

export type Pipeline = Readonly<{
  session: SearchSession;
  aggregator: Aggregator;
  normalizer: QueryNormalizer;
  cache: ResultCache;
  /** Releases connections opened for the cache backend. */
  close: () => Promise<void>;
}>;

type CacheBackendHandle = Readonly<{ store: CacheStore; close: () => Promise<void> }>;

function buildCacheBackend(env: AppEnv, logger: Logger): CacheBackendHandle {
  if (env.cacheBackend === 'redis' && env.redisUrl) {
    const redis = new Redis(env.redisUrl, {
      enableReadyCheck: true,
      connectTimeout: 10_000,
      maxRetriesPerRequest: 1,
    });
    redis.on('error', (error: Error) => {
      logger.warn({ error: error.message }, 'redis cache connection error');
    });
    return {
      store: new RedisCacheStore({ redis }),
      close: async () => {
        await redis.quit();
      },
    };
  }

  return {
    store: new FileCacheStore({ dir: env.cacheDir }),
    close: () => Promise.resolve(),
  };
}

function buildConnector(env: AppEnv): SiteConnector {
  if (env.connector === 'http') {
    return new HttpConnector({
      userAgent: env.scraperUserAgent,
      timeoutMs: env.siteFetchTimeoutMs,
      requestsPerSecond: env.scraperRequestsPerSecond,
    });
  }
  return new SyntheticConnector();
}

export function buildPipeline(
  env: AppEnv,
  logger: Logger,
  overrides: PipelineOverrides = {}
): Pipeline {
  assertRegistryComplete();

  const sites = env.searchSites ?? SUPPORTED_SITES;
  const untemplated = findSitesWithoutTemplate(sites);
  if (untemplated.length > 0) {
    logger.warn({ sites: untemplated }, 'sites without a search URL template use the generic URL');
  }

  const languageModel =
    overrides.languageModel ??
    createLanguageModelClient({
      provider: env.llmProvider,
      baseUrl: env.ollamaBaseUrl,
      model: env.llmModel,
      timeoutMs: env.llmTimeoutMs,
    });
  const normalizer = new QueryNormalizer({
    client: languageModel,
    mode: env.normalizerMode,
    logger,
  });

  const backend: CacheBackendHandle = overrides.cacheStore
    ? { store: overrides.cacheStore, close: () => Promise.resolve() }
    : buildCacheBackend(env, logger);
  const cache = new ResultCache({
    store: backend.store,
    logger,
    singleFlight: env.cacheSingleFlight,
  });

  const connector = overrides.connector ?? buildConnector(env);
  const aggregator = new Aggregator({
    normalizer,
    connector,
    cache,
    sites,
    logger,
    siteTimeoutMs: env.siteFetchTimeoutMs,
    concurrency: env.siteConcurrency,
  });

  logger.info(
    {
      llmProvider: languageModel.kind,
      llmModel: languageModel.model,
      normalizerMode: env.normalizerMode,
      connector: connector.kind,
      cacheBackend: backend.store.kind,
      sites: sites.length,
    },
    'search pipeline ready'
  );

  return {
    session: new SearchSession({ aggregator }),
    aggregator,
    normalizer,
    cache,
    close: backend.close,
  };
}
