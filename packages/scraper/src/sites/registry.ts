/**
 * Sites searched by default, in the order their results are merged.
 */
export const SUPPORTED_SITES = [
  'amazon',
  'ebay',
  'flipkart',
  'snapdeal',
  'indiamart',
  'boodmo',
  'pricerunner',
  'gomechanic',
  'cardekho',
  'autodoc',
  'motointegrator',
  'partslink24',
  'tecalliance',
  'camelcamelcamel',
] as const;

export type SupportedSite = (typeof SUPPORTED_SITES)[number];

/** Search URL prefix per site; the encoded query is appended. */
const SEARCH_URL_PREFIXES = {
  amazon: 'https://www.amazon.in/s?k=',
  ebay: 'https://www.ebay.com/sch/i.html?_nkw=',
  flipkart: 'https://www.flipkart.com/search?q=',
  snapdeal: 'https://www.snapdeal.com/search?keyword=',
  indiamart: 'https://dir.indiamart.com/search.mp?ss=',
  boodmo: 'https://boodmo.com/catalog/search/?q=',
  pricerunner: 'https://www.pricerunner.com/search?q=',
  gomechanic: 'https://gomechanic.in/spares?q=',
  cardekho: 'https://www.cardekho.com/cars?q=',
  autodoc: 'https://www.autodoc.co.uk/search?keyword=',
  motointegrator: 'https://www.motointegrator.com/search?keyword=',
  partslink24: 'https://www.partslink24.com/search?q=',
  tecalliance: 'https://www.tecalliance.com/en/solutions/tecdoc-catalog?q=',
  camelcamelcamel: 'https://camelcamelcamel.com/search?sq=',
} as const satisfies Record<SupportedSite, string>;

export function isSupportedSite(siteId: string): siteId is SupportedSite {
  return Object.prototype.hasOwnProperty.call(SEARCH_URL_PREFIXES, siteId);
}

/**
 * Form-style query encoding: spaces become `+`, everything except ASCII
 * letters, digits and `_.-~` is percent-encoded as UTF-8.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Search URL for `query` on `siteId`. Ids without a template get a generic
 * `<siteId>/search?q=` URL so new registry entries still resolve.
 */
export function buildSearchUrl(siteId: string, query: string): string {
  const encoded = encodeQueryComponent(query);
  const site = siteId.toLowerCase();
  if (isSupportedSite(site)) {
    return `${SEARCH_URL_PREFIXES[site]}${encoded}`;
  }
  return `${site.replace(/\/+$/, '')}/search?q=${encoded}`;
}

export function findSitesWithoutTemplate(sites: readonly string[]): string[] {
  return sites.filter((site) => !isSupportedSite(site.toLowerCase()));
}

/**
 * Throws when any of `sites` lacks a URL template. Run at startup against the
 * supported-site list.
 */
export function assertRegistryComplete(sites: readonly string[] = SUPPORTED_SITES): void {
  const missing = findSitesWithoutTemplate(sites);
  if (missing.length > 0) {
    throw new Error(`No search URL template for site(s): ${missing.join(', ')}`);
  }
}
