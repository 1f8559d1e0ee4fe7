/**
 * Type exports
 */

export type { TagValue, Tags, LogFields, HeaderRecord } from './common';
export { SpanKind, SamplingDecision } from './span';
export type {
  ReferenceType,
  SpanReference,
  SpanLog,
  SpanOptions,
  FinishedSpan,
} from './span';
