export class SiteFetchError extends Error {
  public readonly siteId: string;
  public readonly status: number | undefined;
  public readonly url: string;

  constructor(options: { siteId: string; url: string; status?: number; message?: string }) {
    super(
      options.message ??
        `Fetching ${options.siteId} failed${options.status ? ` (HTTP ${options.status})` : ''}`
    );
    Object.setPrototypeOf(this, SiteFetchError.prototype);
    this.name = 'SiteFetchError';
    this.siteId = options.siteId;
    this.url = options.url;
    this.status = options.status;
  }
}
