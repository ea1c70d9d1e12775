export type NodeEnv = 'development' | 'staging' | 'production' | 'test';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LlmProvider = 'ollama' | 'none';
export type NormalizerMode = 'structured' | 'refine';
export type ConnectorKind = 'synthetic' | 'http';
export type CacheBackend = 'file' | 'redis';

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: LogLevel;

  llmProvider: LlmProvider;
  ollamaBaseUrl: string;
  llmModel: string;
  llmTimeoutMs: number;
  normalizerMode: NormalizerMode;

  /** `null` means every site in the registry. */
  searchSites: readonly string[] | null;
  connector: ConnectorKind;
  siteFetchTimeoutMs: number;
  siteConcurrency: number;
  scraperUserAgent: string;
  scraperRequestsPerSecond: number;

  cacheBackend: CacheBackend;
  cacheDir: string;
  redisUrl: string | null;
  cacheSingleFlight: boolean;

  exportPath: string;
}>;

type EnvSource = Record<string, string | undefined>;

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function requiredString(env: EnvSource, key: string): string {
  const value = optionalString(env, key);
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parseEnum<T extends string>(
  env: EnvSource,
  key: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = optionalString(env, key) ?? fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`Invalid ${key}: ${raw} (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

function parseIntInRange(
  env: EnvSource,
  key: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = optionalString(env, key) ?? String(fallback);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  return value;
}

function parseBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid ${key}: ${raw}`);
}

function parseHttpUrl(env: EnvSource, key: string, fallback: string): string {
  const raw = optionalString(env, key) ?? fallback;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid ${key} protocol: ${url.protocol}`);
  }
  return raw.replace(/\/+$/, '');
}

function parseRedisUrl(env: EnvSource, key: string): string {
  const value = requiredString(env, key);
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${value}`);
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Invalid Redis URL protocol for ${key}: ${url.protocol}`);
  }
  return value;
}

function parseSiteList(env: EnvSource, key: string): readonly string[] | null {
  const raw = optionalString(env, key);
  if (!raw) return null;
  const sites = raw
    .split(',')
    .map((site) => site.trim().toLowerCase())
    .filter(Boolean);
  if (sites.length === 0) {
    throw new Error(`${key} must name at least one site`);
  }
  return [...new Set(sites)];
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  const cacheBackend = parseEnum(env, 'CACHE_BACKEND', ['file', 'redis'], 'file');

  return Object.freeze({
    nodeEnv: parseEnum(
      env,
      'NODE_ENV',
      ['development', 'staging', 'production', 'test'],
      'development'
    ),
    logLevel: parseEnum(env, 'LOG_LEVEL', ['debug', 'info', 'warn', 'error', 'fatal'], 'info'),

    llmProvider: parseEnum(env, 'LLM_PROVIDER', ['ollama', 'none'], 'ollama'),
    ollamaBaseUrl: parseHttpUrl(env, 'OLLAMA_BASE_URL', 'http://localhost:11434'),
    llmModel: optionalString(env, 'LLM_MODEL') ?? 'llama3',
    llmTimeoutMs: parseIntInRange(env, 'LLM_TIMEOUT_MS', 15_000, 1, 600_000),
    normalizerMode: parseEnum(env, 'NORMALIZER_MODE', ['structured', 'refine'], 'structured'),

    searchSites: parseSiteList(env, 'SEARCH_SITES'),
    connector: parseEnum(env, 'CONNECTOR', ['synthetic', 'http'], 'synthetic'),
    siteFetchTimeoutMs: parseIntInRange(env, 'SITE_FETCH_TIMEOUT_MS', 10_000, 1, 600_000),
    siteConcurrency: parseIntInRange(env, 'SITE_CONCURRENCY', 1, 1, 16),
    scraperUserAgent: optionalString(env, 'SCRAPER_USER_AGENT') ?? 'PartScout/1.0',
    scraperRequestsPerSecond: parseIntInRange(env, 'SCRAPER_REQUESTS_PER_SECOND', 2, 1, 100),

    cacheBackend,
    cacheDir: optionalString(env, 'CACHE_DIR') ?? 'cache',
    redisUrl: cacheBackend === 'redis' ? parseRedisUrl(env, 'REDIS_URL') : null,
    cacheSingleFlight: parseBoolean(env, 'CACHE_SINGLE_FLIGHT', false),

    exportPath: optionalString(env, 'EXPORT_PATH') ?? 'auto_parts_results.csv',
  });
}
