/**
 * B3 trace context propagation and span correlation.
 *
 * A service receiving a request extracts the caller's context from the
 * B3 headers, starts its own span as a child, injects that span's
 * context into the headers of every call it makes, and finishes the span
 * when the work is done. Finished spans are reported independently; a
 * backend joins them into one trace by (traceId, spanId, parentSpanId).
 *
 * @example
 * ```typescript
 * import { createTracer, loadConfig, startServerSpan, startClientSpan } from 'b3-trace-propagation';
 *
 * const tracer = createTracer(loadConfig({ serviceName: 'payment-service' }));
 *
 * async function handle(req: IncomingMessage): Promise<void> {
 *   const span = startServerSpan(tracer, 'process-payment', req.headers, {
 *     method: req.method,
 *     path: req.url,
 *   });
 *   try {
 *     const headers: Record<string, string> = {};
 *     const call = startClientSpan(tracer, 'convert-currency', span, headers);
 *     await fetch('http://currency/convert', { headers });
 *     call.finish();
 *   } finally {
 *     span.finish();
 *   }
 * }
 * ```
 *
 * @module b3-trace-propagation
 */

// Types
export { SpanKind, SamplingDecision } from './types';
export type {
  TagValue,
  Tags,
  LogFields,
  HeaderRecord,
  ReferenceType,
  SpanReference,
  SpanLog,
  SpanOptions,
  FinishedSpan,
} from './types';

// Identifiers
export {
  generateTraceId,
  generateSpanId,
  parseTraceId,
  parseSpanId,
  isValidTraceId,
  isValidSpanId,
  formatId,
} from './ids';
export type { TraceId, SpanId } from './ids';

// Span context
export { SpanContext, isValidBaggageKey } from './context';
export type { SpanContextInit } from './context';

// Propagation
export {
  B3Propagator,
  HeaderCarrier,
  toCarrier,
  X_B3_TRACE_ID,
  X_B3_SPAN_ID,
  X_B3_PARENT_SPAN_ID,
  X_B3_SAMPLED,
  X_B3_FLAGS,
  B3_SINGLE,
  BAGGAGE_HEADER_PREFIX,
  DEFAULT_BAGGAGE_LIMITS,
  formatB3Single,
  parseB3Single,
} from './propagation';
export type {
  Carrier,
  B3Format,
  B3PropagatorOptions,
  BaggageLimits,
} from './propagation';

// Tracing
export { Tracer, SpanImpl } from './tracing';
export type { Span, FinishResult, TracerOptions, ExtractResult } from './tracing';

// Sampling
export { ConstSampler, ProbabilisticSampler, RateLimitingSampler } from './sampling';
export type { Sampler, RootSamplingDecision } from './sampling';

// Reporting
export {
  BatchingReporter,
  InMemoryReporter,
  LoggingReporter,
  NoopReporter,
  CircuitBreaker,
  CircuitState,
} from './reporter';
export type {
  Reporter,
  SpanSender,
  BatchingReporterOptions,
  OverflowPolicy,
  ReporterStats,
  CircuitBreakerConfig,
} from './reporter';

// Zipkin
export { ZipkinHttpSender, toZipkinSpan, DEFAULT_ZIPKIN_ENDPOINT } from './zipkin';
export type { ZipkinSpan, ZipkinEndpoint, ZipkinHttpSenderOptions } from './zipkin';

// HTTP helpers
export { startServerSpan, startClientSpan, traceAsync } from './http';
export type { ServerSpanOptions, ClientSpanOptions } from './http';

// Configuration
export { loadConfig, validateConfig, configFromEnvironment, DEFAULT_CONFIG } from './config';
export type { TracingConfig, ConfigOverrides, SamplerConfig, ReporterConfig } from './config';
export { createTracer, createSampler } from './factory';
export type { TracerDependencies } from './factory';

// Logging
export { ConsoleLogger, NoopLogger, getLogContext, injectTraceContext } from './logging';
export type { Logger, LogLevel, LogFormat, LogContext } from './logging';

// Errors
export {
  TracingError,
  InvalidIdentifierError,
  InvalidSpanContextError,
  NoContextFoundError,
  MalformedContextError,
  DoubleFinishError,
  PostFinishMutationError,
  ReporterUnavailableError,
  QueueOverflowError,
  ConfigurationError,
  isTracingError,
  isErrorCategory,
} from './errors';
export type { ErrorCategory } from './errors';
