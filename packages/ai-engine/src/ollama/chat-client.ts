import {
  LanguageModelResponseError,
  LanguageModelUnavailableError,
  type CompletionOptions,
  type LanguageModelClient,
} from '../llm.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'llama3';

type OllamaChatResponse = {
  message?: { role?: string; content?: unknown };
  error?: unknown;
};

/**
 * Non-streaming client for the Ollama `/api/chat` endpoint.
 */
export class OllamaChatClient implements LanguageModelClient {
  public readonly kind = 'ollama' as const;
  public readonly model: string;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  public constructor(params: { baseUrl?: string; model?: string; timeoutMs?: number } = {}) {
    this.baseUrl = (params.baseUrl ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, '');
    this.model = params.model?.trim() || DEFAULT_OLLAMA_MODEL;
    this.timeoutMs = Math.max(1, Math.trunc(params.timeoutMs ?? 15_000));
  }

  public isAvailable(): boolean {
    return true;
  }

  public async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (options.signal?.aborted) {
      throw new LanguageModelUnavailableError('LLM request aborted');
    }

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          stream: false,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new LanguageModelResponseError(
          `LLM_CHAT_FAILED: ${res.status} ${res.statusText}${body ? ` - ${body}` : ''}`,
          res.status
        );
      }

      const json = (await res.json()) as OllamaChatResponse;
      const content = json.message?.content;
      if (typeof content !== 'string') {
        throw new LanguageModelResponseError('LLM response missing message content', res.status);
      }
      return content;
    } finally {
      clearTimeout(t);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
