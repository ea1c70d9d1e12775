import type { Listing } from '@partscout/types';

import { buildSearchUrl } from '../sites/registry.js';
import { SimpleHtmlFetcher, type HtmlContentProvider } from '../utils/html-fetcher.js';
import { extractJsonLd, jsonLdToListings } from '../utils/json-ld-extractor.js';
import { TokenBucketRateLimiter, getDomain } from '../utils/rate-limiter.js';
import { SiteFetchError } from './errors.js';
import type { ConnectorFetchOptions, SiteConnector } from './types.js';

export type HttpConnectorOptions = Readonly<{
  contentProvider?: HtmlContentProvider;
  userAgent?: string;
  timeoutMs?: number;
  /** Per domain. */
  requestsPerSecond?: number;
}>;

/**
 * Fetches each site's search page and reads listings from its schema.org
 * JSON-LD. Sites that render results client-side yield no listings.
 */
export class HttpConnector implements SiteConnector {
  public readonly kind = 'http' as const;

  private readonly contentProvider: HtmlContentProvider;
  private readonly requestsPerSecond: number;
  private readonly limiters = new Map<string, TokenBucketRateLimiter>();

  public constructor(options: HttpConnectorOptions = {}) {
    this.contentProvider =
      options.contentProvider ??
      new SimpleHtmlFetcher({
        ...(options.userAgent ? { userAgent: options.userAgent } : {}),
        ...(options.timeoutMs ? { timeoutMs: options.timeoutMs } : {}),
      });
    this.requestsPerSecond = options.requestsPerSecond ?? 2;
  }

  public async fetch(
    siteId: string,
    query: string,
    options: ConnectorFetchOptions = {}
  ): Promise<Listing[]> {
    const url = buildSearchUrl(siteId, query);
    await this.limiterFor(url).acquire();
    if (options.signal?.aborted) {
      throw new SiteFetchError({ siteId, url, message: `Fetching ${siteId} aborted` });
    }

    const result = await this.contentProvider.fetchHTML(
      url,
      options.signal ? { signal: options.signal } : {}
    );
    if (result.error) {
      throw new SiteFetchError({
        siteId,
        url,
        message: `Fetching ${siteId} failed: ${result.error}`,
      });
    }
    if (result.statusCode < 200 || result.statusCode >= 300) {
      throw new SiteFetchError({ siteId, url, status: result.statusCode });
    }

    return jsonLdToListings(extractJsonLd(result.html), { siteId, link: url });
  }

  private limiterFor(url: string): TokenBucketRateLimiter {
    const domain = getDomain(url);
    let limiter = this.limiters.get(domain);
    if (!limiter) {
      limiter = new TokenBucketRateLimiter(this.requestsPerSecond);
      this.limiters.set(domain, limiter);
    }
    return limiter;
  }
}
