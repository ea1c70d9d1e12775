import { DisabledLanguageModelClient, type LanguageModelClient } from './llm.js';
import { OllamaChatClient } from './ollama/chat-client.js';

export function createLanguageModelClient(params: {
  provider: 'ollama' | 'none';
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
}): LanguageModelClient {
  if (params.provider === 'none') return new DisabledLanguageModelClient();

  return new OllamaChatClient({
    ...(params.baseUrl ? { baseUrl: params.baseUrl } : {}),
    ...(params.model ? { model: params.model } : {}),
    ...(typeof params.timeoutMs === 'number' ? { timeoutMs: params.timeoutMs } : {}),
  });
}

export {
  DisabledLanguageModelClient,
  LanguageModelResponseError,
  LanguageModelUnavailableError,
} from './llm.js';
export type { CompletionOptions, LanguageModelClient, LanguageModelKind } from './llm.js';
export {
  OllamaChatClient,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
} from './ollama/chat-client.js';
export {
  QueryNormalizer,
  FALLBACK_PART_QUERY,
  buildSearchString,
  parsePartQuery,
} from './normalizer/query-normalizer.js';
export type { QueryNormalizerOptions } from './normalizer/query-normalizer.js';
export { extractJsonObject, firstReplyLine } from './normalizer/json-extract.js';
export { buildExtractionPrompt, buildRefinePrompt } from './normalizer/prompts.js';
