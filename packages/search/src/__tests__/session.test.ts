import { describe, expect, it, vi } from 'vitest';

import type { AggregationResult, Listing } from '@partscout/types';

import { SearchSession } from '../session.js';

const completedAt = new Date('2024-05-01T10:00:00.000Z');

function aggregatorReturning(listings: Listing[]) {
  return {
    aggregate: vi.fn(
      (rawQuery: string): Promise<AggregationResult> =>
        Promise.resolve({ normalizedQuery: rawQuery.trim(), listings, sites: [] })
    ),
  };
}

const cheap: Listing = {
  name: 'Brake pad A',
  price: 1500,
  rating: 4,
  link: 'https://a.test',
  siteId: 'amazon',
};
const pricey: Listing = {
  name: 'Brake pad B',
  price: 1800,
  rating: 4.5,
  link: 'https://b.test',
  siteId: 'ebay',
};

describe('SearchSession', () => {
  it('starts empty', () => {
    const session = new SearchSession({ aggregator: aggregatorReturning([]) });
    expect(session.current).toBeNull();
  });

  it('stores the ranked outcome of the last search', async () => {
    const session = new SearchSession({
      aggregator: aggregatorReturning([cheap, pricey]),
      now: () => completedAt,
    });

    const outcome = await session.search(' brake pad ');

    expect(outcome).toMatchObject({
      rawQuery: ' brake pad ',
      normalizedQuery: 'brake pad',
      listings: [cheap, pricey],
      optimal: { ...cheap, score: 0.6 },
      completedAt,
    });
    expect(session.current).toBe(outcome);
  });

  it('reports no optimal listing for an empty table', async () => {
    const session = new SearchSession({ aggregator: aggregatorReturning([]) });

    const outcome = await session.search('brake pad');

    expect(outcome.listings).toEqual([]);
    expect(outcome.optimal).toBeNull();
  });

  it('clears the stored outcome', async () => {
    const session = new SearchSession({ aggregator: aggregatorReturning([cheap]) });
    await session.search('brake pad');

    session.clear();

    expect(session.current).toBeNull();
  });
});
