import type { Listing } from '@partscout/types';

export const DEFAULT_EXPORT_FILENAME = 'auto_parts_results.csv';

const CSV_COLUMNS = ['name', 'price', 'rating', 'link'] as const;

function csvField(value: string | number): string {
  if (typeof value === 'number') return String(value);
  return `"${value.replace(/"/g, '""')}"`;
}

/** Text columns are quoted with `"` doubled; numbers are written bare. */
export function toCsv(listings: readonly Listing[]): string {
  const header = CSV_COLUMNS.join(',');
  const rows = listings.map((listing) =>
    CSV_COLUMNS.map((column) => csvField(listing[column])).join(',')
  );
  return [header, ...rows].join('\n');
}
