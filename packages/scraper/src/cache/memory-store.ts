import type { CachedListingRecord } from '@partscout/types';

import type { CacheStore } from './store.js';

/** Process-local store; entries are copied in and out. */
export class MemoryCacheStore implements CacheStore {
  public readonly kind = 'memory';

  private readonly entries = new Map<string, readonly CachedListingRecord[]>();

  public get(key: string): Promise<readonly CachedListingRecord[] | null> {
    const records = this.entries.get(key);
    return Promise.resolve(records ? records.map((record) => ({ ...record })) : null);
  }

  public put(key: string, records: readonly CachedListingRecord[]): Promise<void> {
    this.entries.set(key, records.map((record) => ({ ...record })));
    return Promise.resolve();
  }

  public get size(): number {
    return this.entries.size;
  }
}
