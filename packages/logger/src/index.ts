export { createLogger, noopLogger, toSnakeKey } from './schema.js';
export type { Logger, LogLevel, CreateLoggerOptions } from './schema.js';
export { redactDeep, isSensitiveKey, REDACTED } from './redaction.js';
export type { RedactionMode } from './redaction.js';
export { withSpan, getTraceContext } from './otel-correlation.js';
export type { SpanAttributes, TraceContext } from './otel-correlation.js';
export { OTEL_ATTR } from './otel-attributes.js';
export type { OtelAttrKey } from './otel-attributes.js';
