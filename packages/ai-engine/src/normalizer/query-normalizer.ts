import { noopLogger, type Logger } from '@partscout/logger';
import type { NormalizerMode, PartQuery } from '@partscout/types';
import { DEFAULT_PRICE_RANGE, PartQueryExtractionSchema } from '@partscout/validation';

import { LanguageModelResponseError, type LanguageModelClient } from '../llm.js';
import { extractJsonObject, firstReplyLine } from './json-extract.js';
import { buildExtractionPrompt, buildRefinePrompt } from './prompts.js';

export const FALLBACK_PART_QUERY: PartQuery = Object.freeze({
  partType: '',
  vehicleModel: '',
  priceRange: DEFAULT_PRICE_RANGE,
});

export type QueryNormalizerOptions = Readonly<{
  client: LanguageModelClient;
  mode?: NormalizerMode;
  logger?: Logger;
}>;

export function buildSearchString(query: Pick<PartQuery, 'partType' | 'vehicleModel'>): string {
  return `${query.partType} for ${query.vehicleModel}`;
}

/**
 * Parses a structured extraction out of a raw model reply.
 * Throws {@link LanguageModelResponseError} when the reply is unusable.
 */
export function parsePartQuery(content: string): PartQuery {
  const json = extractJsonObject(content);
  if (json === null) {
    throw new LanguageModelResponseError('No valid JSON found in response');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    throw new LanguageModelResponseError(
      error instanceof Error ? error.message : 'Invalid JSON payload'
    );
  }

  const parsed = PartQueryExtractionSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid';
    throw new LanguageModelResponseError(`Unexpected extraction shape: ${detail}`);
  }

  return {
    partType: parsed.data.part_type,
    vehicleModel: parsed.data.vehicle_model,
    priceRange: parsed.data.price_range,
  };
}

/**
 * Turns free text into the canonical search string used for every site.
 * One model call per invocation; any failure degrades to a fallback and is
 * only logged. A client that reports itself unavailable is never called.
 */
export class QueryNormalizer {
  public readonly mode: NormalizerMode;

  private readonly client: LanguageModelClient;
  private readonly logger: Logger;

  public constructor(options: QueryNormalizerOptions) {
    this.client = options.client;
    this.mode = options.mode ?? 'structured';
    this.logger = (options.logger ?? noopLogger()).child({ component: 'query-normalizer' });
  }

  public async normalize(rawQuery: string): Promise<string> {
    if (this.mode === 'refine') {
      return this.refine(rawQuery);
    }
    return buildSearchString(await this.extract(rawQuery));
  }

  public async extract(rawQuery: string): Promise<PartQuery> {
    if (!rawQuery.trim() || !this.client.isAvailable()) {
      return FALLBACK_PART_QUERY;
    }

    try {
      const content = await this.client.complete(buildExtractionPrompt(rawQuery));
      return parsePartQuery(content);
    } catch (error) {
      this.logFallback('structured', error);
      return FALLBACK_PART_QUERY;
    }
  }

  public async refine(rawQuery: string): Promise<string> {
    if (!rawQuery.trim() || !this.client.isAvailable()) {
      return rawQuery;
    }

    try {
      const refined = firstReplyLine(await this.client.complete(buildRefinePrompt(rawQuery)));
      if (!refined) {
        throw new LanguageModelResponseError('Empty refined query');
      }
      return refined;
    } catch (error) {
      this.logFallback('refine', error);
      return rawQuery;
    }
  }

  private logFallback(mode: NormalizerMode, error: unknown): void {
    this.logger.warn(
      {
        mode,
        provider: this.client.kind,
        model: this.client.model,
        error: error instanceof Error ? error.message : String(error),
      },
      'query normalization failed, using fallback'
    );
  }
}
