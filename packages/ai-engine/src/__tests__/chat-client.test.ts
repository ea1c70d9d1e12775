import { describe, expect, it, vi } from 'vitest';

import { createLanguageModelClient } from '../index.js';
import {
  DisabledLanguageModelClient,
  LanguageModelResponseError,
  LanguageModelUnavailableError,
} from '../llm.js';
import { OllamaChatClient } from '../ollama/chat-client.js';

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Service Unavailable',
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

describe('OllamaChatClient', () => {
  it('posts a single user message and returns the reply content', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant', content: 'ok' } }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new OllamaChatClient({ baseUrl: 'http://llm.test:11434/', model: 'llama3' });
    await expect(client.complete('hello')).resolves.toBe('ok');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('http://llm.test:11434/api/chat');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'llama3',
      messages: [{ role: 'user', content: 'hello' }],
      stream: false,
    });
  });

  it('rejects with the HTTP status on a non-OK response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503)));

    const client = new OllamaChatClient();
    const error: unknown = await client.complete('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LanguageModelResponseError);
    expect((error as LanguageModelResponseError).status).toBe(503);
  });

  it('rejects when the reply has no message content', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(jsonResponse({ done: true })));

    await expect(new OllamaChatClient().complete('hello')).rejects.toThrow(
      'LLM response missing message content'
    );
  });

  it('aborts the request after the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    await expect(new OllamaChatClient({ timeoutMs: 5 }).complete('hello')).rejects.toThrow(
      'aborted'
    );
  });

  it('does not send a request once the caller has aborted', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new OllamaChatClient().complete('hello', { signal: controller.signal })
    ).rejects.toThrow('LLM request aborted');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('createLanguageModelClient', () => {
  it('returns a disabled client for provider none', async () => {
    const client = createLanguageModelClient({ provider: 'none' });

    expect(client).toBeInstanceOf(DisabledLanguageModelClient);
    expect(client.isAvailable()).toBe(false);
    await expect(client.complete('hello')).rejects.toBeInstanceOf(LanguageModelUnavailableError);
  });

  it('returns an ollama client with the configured model', () => {
    const client = createLanguageModelClient({ provider: 'ollama', model: 'mistral' });

    expect(client.kind).toBe('ollama');
    expect(client.model).toBe('mistral');
  });
});
