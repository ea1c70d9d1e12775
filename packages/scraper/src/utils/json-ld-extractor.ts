import { load } from 'cheerio';
import type { Listing } from '@partscout/types';

export type JsonLdNode = Readonly<Record<string, unknown>>;

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value == null) return [];
  return [value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typesOf(node: Record<string, unknown>): string[] {
  return toArray(node['@type']).map((item) => String(item).toLowerCase());
}

function isRelevantType(node: Record<string, unknown>): boolean {
  const all = typesOf(node);
  return all.includes('product') || all.includes('offer') || all.includes('aggregateoffer');
}

function flattenJsonLdNode(value: unknown): JsonLdNode[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => flattenJsonLdNode(item));
  }
  if (!isRecord(value)) return [];
  const graph = value['@graph'];
  if (Array.isArray(graph)) {
    return graph.flatMap((item) => flattenJsonLdNode(item));
  }
  if (value['@type'] === 'ItemList' && Array.isArray(value['itemListElement'])) {
    return value['itemListElement'].flatMap((entry: unknown) =>
      flattenJsonLdNode(isRecord(entry) && isRecord(entry['item']) ? entry['item'] : entry)
    );
  }
  if (isRelevantType(value)) {
    return [value];
  }
  return [];
}

/**
 * Collects schema.org Product / Offer nodes from every JSON-LD script block.
 * Blocks that are not valid JSON are skipped.
 */
export function extractJsonLd(html: string): JsonLdNode[] {
  const $ = load(html);
  const results: JsonLdNode[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return;
    }
    results.push(...flattenJsonLdNode(parsed));
  });

  return results;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[^0-9.,-]/g, '').replace(/,/g, '');
  if (!cleaned) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function offerPrice(offers: unknown): number | null {
  for (const offer of toArray(offers)) {
    if (!isRecord(offer)) continue;
    const price = toNumber(offer['price']) ?? toNumber(offer['lowPrice']);
    if (price !== null && price >= 0) return price;
  }
  return null;
}

function ratingOf(node: Record<string, unknown>): number {
  const aggregate = node['aggregateRating'];
  if (!isRecord(aggregate)) return 0;
  return toNumber(aggregate['ratingValue']) ?? 0;
}

/**
 * Maps Product nodes (and Offer nodes with an `itemOffered` name) that carry a
 * price to listings. Nodes without a name or price are dropped.
 */
export function jsonLdToListings(
  nodes: readonly JsonLdNode[],
  source: Readonly<{ siteId: string; link: string }>
): Listing[] {
  const listings: Listing[] = [];

  for (const node of nodes) {
    const types = typesOf(node);
    let name: unknown = null;
    let price: number | null = null;
    let rating = 0;

    if (types.includes('product')) {
      name = node['name'];
      price = offerPrice(node['offers']);
      rating = ratingOf(node);
    } else {
      const item = node['itemOffered'];
      if (isRecord(item)) {
        name = item['name'];
        price = offerPrice(node);
        rating = ratingOf(item);
      }
    }

    if (typeof name !== 'string' || !name.trim() || price === null) continue;
    listings.push({ name: name.trim(), price, rating, link: source.link, siteId: source.siteId });
  }

  return listings;
}
