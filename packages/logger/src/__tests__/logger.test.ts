import { describe, expect, it } from 'vitest';

import { createLogger, noopLogger, toSnakeKey } from '../schema.js';

function captureLogger(level: 'debug' | 'info' | 'warn' = 'debug') {
  const lines: string[] = [];
  const logger = createLogger({
    service: 'part-finder',
    env: 'test',
    level,
    version: '1.2.3',
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
  });
  const entries = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { logger, entries };
}

describe('createLogger', () => {
  it('writes message, level and base fields', () => {
    const { logger, entries } = captureLogger();
    logger.info({ siteId: 'amazon' }, 'site fetched');

    const [entry] = entries();
    expect(entry?.['message']).toBe('site fetched');
    expect(entry?.['level']).toBe('info');
    expect(entry?.['service']).toBe('part-finder');
    expect(entry?.['env']).toBe('test');
    expect(entry?.['version']).toBe('1.2.3');
    expect(entry?.['site_id']).toBe('amazon');
    expect(typeof entry?.['timestamp']).toBe('string');
  });

  it('redacts sensitive keys before converting them to snake_case', () => {
    const { logger, entries } = captureLogger();
    logger.warn({ apiKey: 'test-secret', model: 'llama3' }, 'model call failed');

    const [entry] = entries();
    expect(entry?.['api_key']).toBe('[REDACTED]');
    expect(entry?.['model']).toBe('llama3');
  });

  it('merges child context into every entry', () => {
    const { logger, entries } = captureLogger();
    logger.child({ component: 'result-cache' }).debug({ cacheKey: 'abc' }, 'cache miss');

    const [entry] = entries();
    expect(entry?.['component']).toBe('result-cache');
    expect(entry?.['cache_key']).toBe('abc');
  });

  it('drops entries below the configured level', () => {
    const { logger, entries } = captureLogger('warn');
    logger.debug({}, 'hidden');
    logger.info({}, 'hidden too');
    logger.error({}, 'shown');

    expect(entries().map((entry) => entry['message'])).toEqual(['shown']);
  });

  it('flattens errors', () => {
    const { logger, entries } = captureLogger();
    logger.error({ error: new Error('boom') }, 'failed');

    const error = entries()[0]?.['error'] as Record<string, unknown>;
    expect(error['name']).toBe('Error');
    expect(error['message']).toBe('boom');
  });
});

describe('noopLogger', () => {
  it('accepts calls and returns itself as child', () => {
    const logger = noopLogger();
    expect(() => logger.info({ a: 1 }, 'ignored')).not.toThrow();
    expect(logger.child({ b: 2 })).toBe(logger);
  });
});

describe('toSnakeKey', () => {
  it('converts camelCase and keeps snake_case', () => {
    expect(toSnakeKey('normalizedQuery')).toBe('normalized_query');
    expect(toSnakeKey('HTTPStatus')).toBe('http_status');
    expect(toSnakeKey('trace_id')).toBe('trace_id');
  });
});
