export type RedactionMode = 'development' | 'staging' | 'production' | 'test';

const SENSITIVE_KEY_REGEX =
  /(password|secret|token|authorization|cookie|api[_-]?key|api[_-]?secret|access[_-]?token|refresh[_-]?token)/i;

export const REDACTED = '[REDACTED]';

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_REGEX.test(key);
}

/**
 * Returns a copy of `value` with sensitive keys masked and errors flattened to
 * `{ name, message, stack }`. Stacks are cut to three lines in production.
 */
export function redactDeep(value: unknown, mode: RedactionMode): unknown {
  if (value == null) return value;
  if (typeof value !== 'object') return value;

  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if (typeof value.stack === 'string') {
      out['stack'] = truncateStack(value.stack, mode);
    }
    return out;
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item) => redactDeep(item, mode));
  }

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSensitiveKey(key)) {
      out[key] = REDACTED;
      continue;
    }
    out[key] =
      key === 'stack' && typeof entry === 'string'
        ? truncateStack(entry, mode)
        : redactDeep(entry, mode);
  }
  return out;
}

function truncateStack(stack: string, mode: RedactionMode): string {
  if (mode !== 'production') return stack;
  return stack.split('\n').slice(0, 3).join('\n');
}
