import type { Listing } from '@partscout/types';

import { buildSearchUrl } from '../sites/registry.js';
import type { SiteConnector } from './types.js';

export const SYNTHETIC_PRICE_RANGE = [1200, 2000] as const;
export const SYNTHETIC_RATING_RANGE = [3.8, 4.5] as const;

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Stand-in connector: one made-up listing per site with a random price and
 * rating. Replace with a real connector for live data.
 */
export class SyntheticConnector implements SiteConnector {
  public readonly kind = 'synthetic' as const;

  private readonly random: RandomSource;

  public constructor(options: { random?: RandomSource } = {}) {
    this.random = options.random ?? Math.random;
  }

  public fetch(siteId: string, query: string): Promise<Listing[]> {
    const [minPrice, maxPrice] = SYNTHETIC_PRICE_RANGE;
    const [minRating, maxRating] = SYNTHETIC_RATING_RANGE;

    const price = minPrice + Math.floor(this.random() * (maxPrice - minPrice + 1));
    const rating = roundTo(minRating + this.random() * (maxRating - minRating), 2);

    return Promise.resolve([
      {
        name: `${query} - Sample from ${siteId}`,
        price,
        rating,
        link: buildSearchUrl(siteId, query),
        siteId,
      },
    ]);
  }
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
