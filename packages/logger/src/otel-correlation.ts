/**
 * OpenTelemetry helpers shared by the engine and the worker.
 *
 * Without a registered SDK the API returns no-op spans, so these are safe to call in tests.
 */

import { trace, context as otelContext, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

import { OTEL_ATTR } from './otel-attributes.js';

const TRACER_NAME = 'stock-reconciler';

export type SpanAttributes = Record<string, string | number | boolean>;

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
    markSpanFailed(span, error);
    throw error;
  } finally {
    span.end();
  }
}

export function markSpanFailed(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : 'Unknown error',
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
}

export function setRequestIdAttribute(requestId: string): void {
  trace.getActiveSpan()?.setAttribute(OTEL_ATTR.REQUEST_ID, requestId);
}
