export type HtmlFetchResult = Readonly<{
  html: string;
  statusCode: number;
  contentType: string;
  fetchedAt: Date;
  error?: string;
}>;

export interface HtmlContentProvider {
  fetchHTML(url: string, options?: { signal?: AbortSignal }): Promise<HtmlFetchResult>;
}

/**
 * Plain `fetch` based provider. Transport errors and timeouts are reported in
 * `error` instead of being thrown.
 */
export class SimpleHtmlFetcher implements HtmlContentProvider {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options?: { timeoutMs?: number; userAgent?: string }) {
    this.timeoutMs = options?.timeoutMs ?? 10_000;
    this.userAgent = options?.userAgent ?? 'PartScout/1.0';
  }

  async fetchHTML(url: string, options?: { signal?: AbortSignal }): Promise<HtmlFetchResult> {
    if (options?.signal?.aborted) {
      return {
        html: '',
        statusCode: 0,
        contentType: '',
        fetchedAt: new Date(),
        error: 'Request aborted',
      };
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options?.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
      });

      const html = await response.text();
      return {
        html,
        statusCode: response.status,
        contentType: response.headers.get('content-type') ?? 'text/html',
        fetchedAt: new Date(),
      };
    } catch (error) {
      return {
        html: '',
        statusCode: 0,
        contentType: '',
        fetchedAt: new Date(),
        error: error instanceof Error ? error.message : 'Unknown fetch error',
      };
    } finally {
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener('abort', onAbort);
    }
  }
}
