import { OTEL_ATTR, noopLogger, withSpan, type Logger } from '@partscout/logger';
import { SUPPORTED_SITES, type ResultCache, type SiteConnector } from '@partscout/scraper';
import type { AggregationResult, Listing, SiteAggregationStats } from '@partscout/types';

import { SiteTimeoutError } from './errors.js';

export const DEFAULT_SITE_TIMEOUT_MS = 10_000;

/** Anything that turns a raw request into the search string. Must not reject. */
export interface SearchQueryNormalizer {
  normalize(rawQuery: string): Promise<string>;
}

export type AggregatorOptions = Readonly<{
  normalizer: SearchQueryNormalizer;
  connector: SiteConnector;
  cache: ResultCache;
  /** Visited in this order. Defaults to every supported site. */
  sites?: readonly string[];
  logger?: Logger;
  /** 0 disables the per-site timeout. */
  siteTimeoutMs?: number;
  /** Sites looked up at once; 1 is sequential. */
  concurrency?: number;
}>;

type SiteOutcome = Readonly<{
  listings: readonly Listing[];
  stats: SiteAggregationStats;
}>;

async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    results.push(...(await Promise.all(batch.map(fn))));
  }
  return results;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fans one normalized query out to every site through the result cache and
 * merges the listings in site order. A failing site contributes nothing.
 */
export class Aggregator {
  public readonly sites: readonly string[];

  private readonly normalizer: SearchQueryNormalizer;
  private readonly connector: SiteConnector;
  private readonly cache: ResultCache;
  private readonly logger: Logger;
  private readonly siteTimeoutMs: number;
  private readonly concurrency: number;

  public constructor(options: AggregatorOptions) {
    this.normalizer = options.normalizer;
    this.connector = options.connector;
    this.cache = options.cache;
    this.sites = [...(options.sites ?? SUPPORTED_SITES)];
    this.logger = (options.logger ?? noopLogger()).child({ component: 'aggregator' });
    this.siteTimeoutMs = Math.max(0, options.siteTimeoutMs ?? DEFAULT_SITE_TIMEOUT_MS);
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  public async aggregate(rawQuery: string): Promise<AggregationResult> {
    return withSpan(
      'search.aggregate',
      {
        [OTEL_ATTR.SEARCH_RAW_QUERY_LENGTH]: rawQuery.length,
        [OTEL_ATTR.SEARCH_SITE_COUNT]: this.sites.length,
      },
      async (span) => {
        const normalizedQuery = await this.normalizer.normalize(rawQuery);
        span.setAttribute(OTEL_ATTR.SEARCH_NORMALIZED_QUERY, normalizedQuery);

        const outcomes = await mapInBatches(this.sites, this.concurrency, (siteId) =>
          this.searchSite(normalizedQuery, siteId)
        );
        const listings = outcomes.flatMap((outcome) => outcome.listings);
        const sites = outcomes.map((outcome) => outcome.stats);

        span.setAttribute(OTEL_ATTR.SEARCH_LISTING_COUNT, listings.length);
        this.logger.info(
          {
            normalizedQuery,
            sites: sites.length,
            failedSites: sites.filter((site) => site.status === 'failed').length,
            listings: listings.length,
          },
          'search aggregated'
        );

        return { normalizedQuery, listings, sites };
      }
    );
  }

  private async searchSite(normalizedQuery: string, siteId: string): Promise<SiteOutcome> {
    const startedAt = Date.now();
    try {
      const lookup = await withSpan(
        'search.site',
        { [OTEL_ATTR.SITE_ID]: siteId },
        async (span) => {
          const result = await this.withTimeout(siteId, (signal) =>
            this.cache.lookup(normalizedQuery, siteId, () =>
              this.connector.fetch(siteId, normalizedQuery, signal ? { signal } : {})
            )
          );
          span.setAttribute(OTEL_ATTR.SITE_CACHE_HIT, result.hit);
          return result;
        }
      );

      return {
        listings: lookup.listings,
        stats: {
          siteId,
          status: 'ok',
          listings: lookup.listings.length,
          durationMs: Date.now() - startedAt,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ siteId, normalizedQuery, error: message }, 'site search failed, skipping');
      return {
        listings: [],
        stats: {
          siteId,
          status: 'failed',
          listings: 0,
          durationMs: Date.now() - startedAt,
          error: message,
        },
      };
    }
  }

  private async withTimeout<T>(
    siteId: string,
    run: (signal: AbortSignal | undefined) => Promise<T>
  ): Promise<T> {
    if (this.siteTimeoutMs === 0) {
      return run(undefined);
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new SiteTimeoutError(siteId, this.siteTimeoutMs);
        controller.abort(error);
        reject(error);
      }, this.siteTimeoutMs);
    });

    try {
      return await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
