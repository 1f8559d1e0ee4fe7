/**
 * Tracing module exports
 */

export type { Span, FinishResult, SpanHooks } from './interface';
export { SpanImpl } from './span';
export type { SpanInit } from './span';
export { Tracer } from './tracer';
export type { TracerOptions, ExtractResult } from './tracer';
