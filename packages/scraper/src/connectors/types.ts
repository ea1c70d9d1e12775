import type { Listing } from '@partscout/types';

export type ConnectorKind = 'synthetic' | 'http' | 'static';

export type ConnectorFetchOptions = Readonly<{
  /** Aborted when the caller stops waiting for this site. */
  signal?: AbortSignal;
}>;

/**
 * Produces the listings one site offers for a normalized query.
 * Every listing carries `siteId` and a `link` built by the site registry.
 */
export interface SiteConnector {
  readonly kind: ConnectorKind;
  fetch(siteId: string, query: string, options?: ConnectorFetchOptions): Promise<Listing[]>;
}
