/**
 * Span interface for B3 tracing.
 *
 * Defines the public API for working with spans in distributed tracing.
 */

import type { SpanContext } from '../context';
import type { DoubleFinishError, TracingError } from '../errors';
import type {
  FinishedSpan,
  LogFields,
  SpanKind,
  SpanLog,
  SpanReference,
  Tags,
  TagValue,
} from '../types';

/**
 * Outcome of Span.finish()
 */
export type FinishResult =
  | { ok: true; span: FinishedSpan }
  | { ok: false; error: DoubleFinishError };

/**
 * Callbacks a span uses to hand itself back to its tracer
 */
export interface SpanHooks {
  /** Called exactly once, with the frozen snapshot */
  onFinish(span: FinishedSpan): void;
  /** Lifecycle errors; never thrown at the caller */
  onError(error: TracingError): void;
}

/**
 * Span represents a single unit of work in a distributed trace.
 *
 * A span is owned by the code path that started it and has a single
 * writer: there is no internal locking. Once finished it cannot change.
 */
export interface Span {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly operationName: string;
  readonly kind: SpanKind;
  readonly reference?: SpanReference;

  /**
   * Start time in milliseconds since epoch
   */
  readonly startTime: number;

  /**
   * Finish time in milliseconds since epoch, once finished
   */
  readonly finishTime?: number;

  /**
   * Duration in milliseconds (only available after span is finished)
   */
  readonly duration?: number;

  readonly tags: Readonly<Tags>;
  readonly logs: ReadonlyArray<SpanLog>;
  readonly isFinished: boolean;

  /**
   * Set a tag on the span.
   *
   * On a finished span the tag is rejected and a PostFinishMutationError
   * goes to the tracer's error handler.
   *
   * @example
   * ```typescript
   * span
   *   .setTag('http.method', 'POST')
   *   .setTag('http.status_code', 201);
   * ```
   */
  setTag(key: string, value: TagValue): Span;

  addTags(tags: Tags): Span;

  /**
   * Record a timestamped structured log entry.
   *
   * @param timestamp - Milliseconds since epoch (defaults to now)
   */
  logFields(fields: LogFields, timestamp?: number): Span;

  /**
   * Mark the span as errored: sets `error=true` and logs the error
   */
  setError(error: Error | string): Span;

  setOperationName(name: string): Span;

  /**
   * Finish the span and hand it to the reporter.
   *
   * The first call wins; later calls change nothing and return a
   * DoubleFinishError.
   *
   * @example
   * ```typescript
   * const span = tracer.startSpan('payment.charge');
   * try {
   *   await charge(card);
   * } finally {
   *   span.finish();
   * }
   * ```
   */
  finish(finishTime?: number): FinishResult;

  /**
   * Get the span context for propagation
   */
  context(): SpanContext;
}
