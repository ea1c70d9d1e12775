import type { Redis } from 'ioredis';

import type { CachedListingRecord } from '@partscout/types';

import { parseCachedRecords } from './records.js';
import { CacheIoError, type CacheStore } from './store.js';

export const DEFAULT_REDIS_CACHE_PREFIX = 'partscout:results:';

export type RedisCacheClient = Pick<Redis, 'get' | 'set'>;

/**
 * Redis-backed store (plain GET / SET, no expiry). Keys are namespaced with
 * `prefix`.
 */
export class RedisCacheStore implements CacheStore {
  public readonly kind = 'redis';

  private readonly redis: RedisCacheClient;
  private readonly prefix: string;

  public constructor(options: { redis: RedisCacheClient; prefix?: string }) {
    this.redis = options.redis;
    this.prefix = options.prefix ?? DEFAULT_REDIS_CACHE_PREFIX;
  }

  public async get(key: string): Promise<readonly CachedListingRecord[] | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.prefix + key);
    } catch (error) {
      throw new CacheIoError({ key, operation: 'get', cause: error });
    }
    if (raw === null) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new CacheIoError({ key, operation: 'get', cause: error });
    }
    const records = parseCachedRecords(payload);
    if (!records) {
      const cause = new Error('unexpected entry shape');
      throw new CacheIoError({ key, operation: 'get', cause });
    }
    return records;
  }

  public async put(key: string, records: readonly CachedListingRecord[]): Promise<void> {
    try {
      await this.redis.set(this.prefix + key, JSON.stringify(records));
    } catch (error) {
      throw new CacheIoError({ key, operation: 'put', cause: error });
    }
  }
}
