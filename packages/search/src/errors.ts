export class SiteTimeoutError extends Error {
  public readonly siteId: string;
  public readonly timeoutMs: number;

  constructor(siteId: string, timeoutMs: number) {
    super(`Site ${siteId} did not respond within ${timeoutMs}ms`);
    Object.setPrototypeOf(this, SiteTimeoutError.prototype);
    this.name = 'SiteTimeoutError';
    this.siteId = siteId;
    this.timeoutMs = timeoutMs;
  }
}
