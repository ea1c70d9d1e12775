import { trace, context as otelContext, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

const TRACER_NAME = 'partscout';

export type SpanAttributes = Record<string, string | number | boolean>;

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
}>;

export function getTraceContext(): TraceContext {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext) {
    return { traceId: undefined, spanId: undefined };
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

/**
 * Run `fn` inside a new active span. The span is marked as errored and the
 * error rethrown when `fn` rejects.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = trace.getTracer(TRACER_NAME).startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    if (error instanceof Error) {
      span.recordException(error);
    }
    throw error;
  } finally {
    span.end();
  }
}
