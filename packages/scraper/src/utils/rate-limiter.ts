/**
 * In-process token bucket. `acquire` resolves once a token is available.
 */
export class TokenBucketRateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;

  constructor(requestsPerSecond: number) {
    this.maxTokens = Math.max(1, requestsPerSecond);
    this.tokens = this.maxTokens;
    this.refillRate = this.maxTokens;
    this.lastRefill = Date.now();
  }

  /** Resolves with the milliseconds spent waiting. */
  async acquire(): Promise<number> {
    this.refill();
    let waitTimeMs = 0;
    if (this.tokens < 1) {
      waitTimeMs = Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
      await new Promise((resolve) => setTimeout(resolve, waitTimeMs));
      this.refill();
    }
    this.tokens -= 1;
    return waitTimeMs;
  }

  private refill(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }
}

export function getDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return 'unknown';
  }
}
