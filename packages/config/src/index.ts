export { loadEnv } from './env.js';
export type {
  AppEnv,
  NodeEnv,
  LogLevel,
  LlmProvider,
  NormalizerMode,
  ConnectorKind,
  CacheBackend,
} from './env.js';
