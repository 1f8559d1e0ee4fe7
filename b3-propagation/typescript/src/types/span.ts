/**
 * Span-related types for distributed tracing.
 */

import type { LogFields, Tags } from './common';
import type { SpanContext } from '../context';

/**
 * Role of a span in the interaction it records
 */
export enum SpanKind {
  CLIENT = 'client',
  SERVER = 'server',
  PRODUCER = 'producer',
  CONSUMER = 'consumer',
  INTERNAL = 'internal',
}

/**
 * Sampling decision carried by every context of a trace.
 *
 * DEFERRED only lives on a context extracted from a caller that did not
 * decide; the first tracer that starts a span from it resolves it.
 */
export enum SamplingDecision {
  SAMPLED = 'sampled',
  NOT_SAMPLED = 'not_sampled',
  DEFERRED = 'deferred',
}

/**
 * How a span relates to its parent
 */
export type ReferenceType = 'child_of' | 'follows_from';

export interface SpanReference {
  type: ReferenceType;
  context: SpanContext;
}

/**
 * A timestamped log entry on a span
 */
export interface SpanLog {
  /** Milliseconds since epoch */
  timestamp: number;
  fields: Readonly<LogFields>;
}

/**
 * Options for starting a span
 */
export interface SpanOptions {
  /** Parent context; the new span blocks on nothing but is caused by it */
  childOf?: SpanContext;
  /** Loosely-coupled parent, e.g. a fire-and-forget producer */
  followsFrom?: SpanContext;
  /** Remote caller context; same as childOf with kind SERVER */
  rpcServer?: SpanContext;
  /** Span kind (defaults to INTERNAL, or SERVER with rpcServer) */
  kind?: SpanKind;
  /** Tags applied at creation */
  tags?: Tags;
  /** Start time in milliseconds since epoch (defaults to now) */
  startTime?: number;
}

/**
 * Immutable snapshot of a finished span, as handed to a reporter
 */
export interface FinishedSpan {
  readonly operationName: string;
  readonly serviceName: string;
  readonly context: SpanContext;
  readonly kind: SpanKind;
  readonly reference?: Readonly<SpanReference>;
  readonly startTime: number;
  readonly finishTime: number;
  readonly duration: number;
  readonly tags: Readonly<Tags>;
  readonly logs: ReadonlyArray<SpanLog>;
}
