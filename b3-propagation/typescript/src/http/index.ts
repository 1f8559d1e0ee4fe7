/**
 * HTTP helpers for the host contract: extract on receive, inject on send,
 * finish when the work is done.
 */

import { SpanContext } from '../context';
import { toError } from '../errors';
import type { Span, Tracer } from '../tracing';
import { SpanKind } from '../types';
import type { HeaderRecord, SpanOptions, Tags } from '../types';

export interface ServerSpanOptions {
  method?: string;
  path?: string;
  tags?: Tags;
  startTime?: number;
}

export interface ClientSpanOptions {
  method?: string;
  url?: string;
  tags?: Tags;
  startTime?: number;
}

/**
 * Start the SERVER span for an inbound request.
 *
 * Continues the caller's trace when the headers carry a valid context,
 * otherwise starts a new trace.
 */
export function startServerSpan(
  tracer: Tracer,
  operationName: string,
  headers: HeaderRecord,
  options?: ServerSpanOptions
): Span {
  const tags: Tags = { ...options?.tags };
  if (options?.method) tags['http.method'] = options.method;
  if (options?.path) tags['http.path'] = options.path;

  return tracer.startSpanFromCarrier(operationName, headers, {
    kind: SpanKind.SERVER,
    tags,
    startTime: options?.startTime,
  });
}

/**
 * Start a CLIENT span for an outbound request and inject its context
 * into the request headers.
 *
 * @param parent - Span or context of the work making the call; omitted starts a new trace
 * @param headers - Outgoing headers, written in place
 */
export function startClientSpan(
  tracer: Tracer,
  operationName: string,
  parent: Span | SpanContext | undefined,
  headers: HeaderRecord,
  options?: ClientSpanOptions
): Span {
  const tags: Tags = { ...options?.tags };
  if (options?.method) tags['http.method'] = options.method;
  if (options?.url) tags['http.url'] = options.url;

  const span = tracer.startSpan(operationName, {
    childOf: parent instanceof SpanContext ? parent : parent?.context(),
    kind: SpanKind.CLIENT,
    tags,
    startTime: options?.startTime,
  });
  tracer.inject(span.context(), headers);
  return span;
}

/**
 * Run fn inside a span. The span is always finished; an error thrown by
 * fn is recorded on the span and rethrown unchanged.
 */
export async function traceAsync<T>(
  tracer: Tracer,
  operationName: string,
  fn: (span: Span) => Promise<T>,
  options?: SpanOptions
): Promise<T> {
  const span = tracer.startSpan(operationName, options);
  try {
    return await fn(span);
  } catch (error) {
    span.setError(toError(error));
    throw error;
  } finally {
    span.finish();
  }
}
