import { createHash } from 'crypto';

/**
 * 128-bit MD5 hex digest of `normalizedQuery + siteId`. Collisions are
 * accepted and not detected.
 */
export function buildCacheKey(normalizedQuery: string, siteId: string): string {
  return createHash('md5').update(normalizedQuery + siteId, 'utf8').digest('hex');
}
