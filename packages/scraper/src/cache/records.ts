import type { CachedListingRecord, Listing } from '@partscout/types';
import { CachedListingRecordsSchema } from '@partscout/validation';

export function toCachedRecords(listings: readonly Listing[]): CachedListingRecord[] {
  return listings.map(({ name, price, rating, link }) => ({ name, price, rating, link }));
}

export function fromCachedRecords(
  records: readonly CachedListingRecord[],
  siteId: string
): Listing[] {
  return records.map(({ name, price, rating, link }) => ({ name, price, rating, link, siteId }));
}

/**
 * Validates a decoded cache payload. Returns `null` when it does not match
 * the stored record shape.
 */
export function parseCachedRecords(payload: unknown): CachedListingRecord[] | null {
  const parsed = CachedListingRecordsSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}
