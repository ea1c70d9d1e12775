import type { CachedListingRecord } from '@partscout/types';

/**
 * Durable key-value capability behind the result cache. Implementations may
 * add expiry or bounds without the cache or aggregator changing.
 */
export interface CacheStore {
  readonly kind: string;
  /** `null` when the key has no entry. Throws {@link CacheIoError} on IO failure. */
  get(key: string): Promise<readonly CachedListingRecord[] | null>;
  put(key: string, records: readonly CachedListingRecord[]): Promise<void>;
}

export class CacheIoError extends Error {
  public readonly key: string;
  public readonly operation: 'get' | 'put';

  constructor(options: { key: string; operation: 'get' | 'put'; cause?: unknown }) {
    const detail =
      options.cause instanceof Error ? options.cause.message : String(options.cause ?? 'unknown');
    super(`Cache ${options.operation} failed for ${options.key}: ${detail}`, {
      cause: options.cause,
    });
    Object.setPrototypeOf(this, CacheIoError.prototype);
    this.name = 'CacheIoError';
    this.key = options.key;
    this.operation = options.operation;
  }
}
