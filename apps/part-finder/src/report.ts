import type { Listing, SearchOutcome } from '@partscout/types';

export const NO_RESULTS_MESSAGE = 'No suitable products found.';

function formatListingLine(index: number, listing: Listing): string {
  return `${index + 1}. [${listing.siteId}] ${listing.name} | price ${listing.price} | rating ${listing.rating} | ${listing.link}`;
}

/** Plain-text rendering of one search for the terminal. */
export function formatReport(outcome: SearchOutcome): string {
  const lines = [`Search query: ${outcome.normalizedQuery}`, ''];

  if (!outcome.optimal) {
    lines.push(NO_RESULTS_MESSAGE);
    return `${lines.join('\n')}\n`;
  }

  lines.push(`Results (${outcome.listings.length}):`);
  outcome.listings.forEach((listing, index) => lines.push(formatListingLine(index, listing)));

  const best = outcome.optimal;
  lines.push(
    '',
    `Optimal: ${best.name} from ${best.siteId} at ${best.price} (rating ${best.rating}, score ${best.score.toFixed(3)})`,
    `Link: ${best.link}`
  );
  return `${lines.join('\n')}\n`;
}
