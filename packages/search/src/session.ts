import type { AggregationResult, SearchOutcome } from '@partscout/types';

import { selectOptimal } from './ranker.js';

export interface ListingAggregator {
  aggregate(rawQuery: string): Promise<AggregationResult>;
}

/**
 * Holds the outcome of the last search. One session per user or invocation;
 * nothing is shared between sessions.
 */
export class SearchSession {
  private readonly aggregator: ListingAggregator;
  private readonly now: () => Date;
  private outcome: SearchOutcome | null = null;

  public constructor(options: { aggregator: ListingAggregator; now?: () => Date }) {
    this.aggregator = options.aggregator;
    this.now = options.now ?? (() => new Date());
  }

  public get current(): SearchOutcome | null {
    return this.outcome;
  }

  public async search(rawQuery: string): Promise<SearchOutcome> {
    const { normalizedQuery, listings } = await this.aggregator.aggregate(rawQuery);
    const outcome: SearchOutcome = {
      rawQuery,
      normalizedQuery,
      listings,
      optimal: selectOptimal(listings),
      completedAt: this.now(),
    };
    this.outcome = outcome;
    return outcome;
  }

  public clear(): void {
    this.outcome = null;
  }
}
