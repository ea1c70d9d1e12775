import { noopLogger, type Logger } from '@partscout/logger';
import type { CachedListingRecord, Listing } from '@partscout/types';

import { buildCacheKey } from '../utils/content-hash.js';
import { fromCachedRecords, toCachedRecords } from './records.js';
import type { CacheStore } from './store.js';

export type ResultCacheOptions = Readonly<{
  store: CacheStore;
  logger?: Logger;
  /**
   * Coalesce concurrent misses for the same key onto one fetch within this
   * process. Off by default: concurrent misses each fetch and the last write
   * wins.
   */
  singleFlight?: boolean;
}>;

export type CacheLookup = Readonly<{
  key: string;
  hit: boolean;
  listings: Listing[];
}>;

/**
 * Read-through cache of per-site listings keyed by (normalized query, site).
 * Entries never expire. Store failures degrade to a miss on read and to an
 * unpersisted result on write; fetch failures propagate.
 */
export class ResultCache {
  private readonly store: CacheStore;
  private readonly logger: Logger;
  private readonly singleFlight: boolean;
  private readonly inFlight = new Map<string, Promise<Listing[]>>();

  public constructor(options: ResultCacheOptions) {
    this.store = options.store;
    this.logger = (options.logger ?? noopLogger()).child({
      component: 'result-cache',
      store: options.store.kind,
    });
    this.singleFlight = options.singleFlight ?? false;
  }

  public async getOrFetch(
    normalizedQuery: string,
    siteId: string,
    fetch: () => Promise<Listing[]>
  ): Promise<Listing[]> {
    return (await this.lookup(normalizedQuery, siteId, fetch)).listings;
  }

  public async lookup(
    normalizedQuery: string,
    siteId: string,
    fetch: () => Promise<Listing[]>
  ): Promise<CacheLookup> {
    const key = buildCacheKey(normalizedQuery, siteId);

    const cached = await this.read(key, siteId);
    if (cached) {
      this.logger.debug({ key, siteId, listings: cached.length }, 'cache hit');
      return { key, hit: true, listings: fromCachedRecords(cached, siteId) };
    }

    this.logger.debug({ key, siteId }, 'cache miss');
    if (!this.singleFlight) {
      return { key, hit: false, listings: await this.fetchAndStore(key, siteId, fetch) };
    }

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = this.fetchAndStore(key, siteId, fetch).finally(() => this.inFlight.delete(key));
      this.inFlight.set(key, pending);
    }
    return { key, hit: false, listings: await pending };
  }

  private async read(key: string, siteId: string): Promise<readonly CachedListingRecord[] | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      this.logger.warn(
        { key, siteId, error: error instanceof Error ? error.message : String(error) },
        'cache read failed, treating as miss'
      );
      return null;
    }
  }

  private async fetchAndStore(
    key: string,
    siteId: string,
    fetch: () => Promise<Listing[]>
  ): Promise<Listing[]> {
    const listings = await fetch();
    try {
      await this.store.put(key, toCachedRecords(listings));
    } catch (error) {
      this.logger.warn(
        { key, siteId, error: error instanceof Error ? error.message : String(error) },
        'cache write failed, result not persisted'
      );
    }
    return listings;
  }
}
