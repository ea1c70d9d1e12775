import type { Listing } from '@partscout/types';

import { buildSearchUrl } from '../sites/registry.js';
import type { SiteConnector } from './types.js';

export type StaticListingSeed = Readonly<{
  name: string;
  price: number;
  rating: number;
}>;

/**
 * Serves fixed listings per site regardless of the query. Sites without seeds
 * return no listings.
 */
export class StaticConnector implements SiteConnector {
  public readonly kind = 'static' as const;

  private readonly seeds: ReadonlyMap<string, readonly StaticListingSeed[]>;

  public constructor(seeds: Record<string, readonly StaticListingSeed[]>) {
    this.seeds = new Map(Object.entries(seeds));
  }

  public fetch(siteId: string, query: string): Promise<Listing[]> {
    const link = buildSearchUrl(siteId, query);
    return Promise.resolve(
      (this.seeds.get(siteId) ?? []).map((seed) => ({ ...seed, link, siteId }))
    );
  }
}
