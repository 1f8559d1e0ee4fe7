/**
 * Log-trace correlation helpers
 */

import type { SpanContext } from '../context';

/**
 * Trace identifiers to attach to application log entries
 */
export interface LogContext {
  trace_id: string;
  span_id: string;
  parent_span_id?: string;
  sampled?: boolean;
}

/**
 * Build a log context from a span context
 */
export function getLogContext(context: SpanContext): LogContext {
  const logContext: LogContext = {
    trace_id: context.traceId,
    span_id: context.spanId,
    sampled: context.isSampled,
  };
  if (context.parentSpanId) {
    logContext.parent_span_id = context.parentSpanId;
  }
  return logContext;
}

/**
 * Merge trace identifiers into a log entry's context
 *
 * @param fields - Existing log fields
 * @param context - Span context to correlate with, if any
 */
export function injectTraceContext(
  fields: Record<string, unknown>,
  context: SpanContext | null | undefined
): Record<string, unknown> {
  if (!context) {
    return fields;
  }
  return { ...fields, ...getLogContext(context) };
}
