import { describe, expect, it, vi } from 'vitest';

import type { Logger } from '@partscout/logger';

import { DisabledLanguageModelClient, type LanguageModelClient } from '../llm.js';
import { buildExtractionPrompt } from '../normalizer/prompts.js';
import {
  FALLBACK_PART_QUERY,
  QueryNormalizer,
  parsePartQuery,
} from '../normalizer/query-normalizer.js';

function replyingClient(reply: string | Error) {
  const complete = vi.fn((_prompt: string) =>
    reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply)
  );
  const client: LanguageModelClient = {
    kind: 'ollama',
    model: 'llama3',
    isAvailable: () => true,
    complete,
  };
  return { client, complete };
}

function spyLogger() {
  const warn = vi.fn();
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
  };
  return { logger, warn };
}

describe('parsePartQuery', () => {
  it('reads the JSON object out of surrounding prose', () => {
    const content =
      'Sure! Here is the extraction:\n' +
      '{"part_type": "brake pad", "vehicle_model": "Honda City", "price_range": [1000, 2000]}\n' +
      'Let me know if you need anything else.';

    expect(parsePartQuery(content)).toEqual({
      partType: 'brake pad',
      vehicleModel: 'Honda City',
      priceRange: [1000, 2000],
    });
  });

  it('rejects a reply without JSON', () => {
    expect(() => parsePartQuery('I cannot help with that.')).toThrow(
      'No valid JSON found in response'
    );
  });

  it('rejects a reply with the wrong shape', () => {
    expect(() => parsePartQuery('{"vehicle_model": "Swift"}')).toThrow(
      'Unexpected extraction shape: part_type Required'
    );
  });
});

describe('QueryNormalizer (structured)', () => {
  it('joins part type and vehicle model', async () => {
    const { client, complete } = replyingClient(
      '{"part_type": "brake pad", "vehicle_model": "Honda City", "price_range": [0, 5000]}'
    );
    const normalizer = new QueryNormalizer({ client });

    await expect(normalizer.normalize('need brake pads for my honda city')).resolves.toBe(
      'brake pad for Honda City'
    );
    expect(complete).toHaveBeenCalledWith(buildExtractionPrompt('need brake pads for my honda city'));
  });

  it('falls back on a truncated JSON reply', async () => {
    const { client } = replyingClient('{"part_type": "brake pad", "vehicle_model": "Hon');
    const { logger, warn } = spyLogger();
    const normalizer = new QueryNormalizer({ client, logger });

    await expect(normalizer.extract('brake pad for Honda City')).resolves.toEqual(
      FALLBACK_PART_QUERY
    );
    await expect(normalizer.normalize('brake pad for Honda City')).resolves.toBe(' for ');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it.each(['[]', '"not specified"', '[1000, 2000, "INR"]', '["under 2000", null]'])(
    'keeps part and vehicle when the price range is %s',
    async (priceRange) => {
      const { client } = replyingClient(
        `{"part_type": "brake pad", "vehicle_model": "Honda City", "price_range": ${priceRange}}`
      );
      const { logger, warn } = spyLogger();
      const normalizer = new QueryNormalizer({ client, logger });

      await expect(normalizer.normalize('brake pad for Honda City')).resolves.toBe(
        'brake pad for Honda City'
      );
      await expect(normalizer.extract('brake pad for Honda City')).resolves.toMatchObject({
        priceRange: [0, 999_999],
      });
      expect(warn).not.toHaveBeenCalled();
    }
  );

  it('skips a disabled model without calling it or warning', async () => {
    const client = new DisabledLanguageModelClient();
    const complete = vi.spyOn(client, 'complete');
    const { logger, warn } = spyLogger();
    const normalizer = new QueryNormalizer({ client, logger });

    await expect(normalizer.normalize('brake pad for Honda City')).resolves.toBe(' for ');
    expect(complete).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('does not call the model for a blank query', async () => {
    const { client, complete } = replyingClient('{"part_type": "x"}');
    const normalizer = new QueryNormalizer({ client });

    await expect(normalizer.normalize('   ')).resolves.toBe(' for ');
    expect(complete).not.toHaveBeenCalled();
  });
});

describe('QueryNormalizer (refine)', () => {
  it('returns the refined first line', async () => {
    const { client } = replyingClient('"brake pad Honda City 2019"\n(shortened for search)');
    const normalizer = new QueryNormalizer({ client, mode: 'refine' });

    await expect(normalizer.normalize('pads for braking, honda city 2019')).resolves.toBe(
      'brake pad Honda City 2019'
    );
  });

  it('returns the raw query when the model fails', async () => {
    const { client } = replyingClient(new Error('connect ECONNREFUSED 127.0.0.1:11434'));
    const { logger, warn } = spyLogger();
    const normalizer = new QueryNormalizer({ client, mode: 'refine', logger });

    await expect(normalizer.normalize('brake pad for Honda City')).resolves.toBe(
      'brake pad for Honda City'
    );
    expect(warn).toHaveBeenCalledWith(
      {
        mode: 'refine',
        provider: 'ollama',
        model: 'llama3',
        error: 'connect ECONNREFUSED 127.0.0.1:11434',
      },
      'query normalization failed, using fallback'
    );
  });

  it('returns the raw query without calling a disabled model', async () => {
    const client = new DisabledLanguageModelClient();
    const complete = vi.spyOn(client, 'complete');
    const { logger, warn } = spyLogger();
    const normalizer = new QueryNormalizer({ client, mode: 'refine', logger });

    await expect(normalizer.normalize('brake pad for Honda City')).resolves.toBe(
      'brake pad for Honda City'
    );
    expect(complete).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('returns the raw query for an empty reply', async () => {
    const { client } = replyingClient('\n  \n');
    const normalizer = new QueryNormalizer({ client, mode: 'refine' });

    await expect(normalizer.normalize('wiper blade swift')).resolves.toBe('wiper blade swift');
  });
});
