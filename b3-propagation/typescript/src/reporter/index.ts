/**
 * Reporter module exports
 */

export type { Reporter, SpanSender, ReportErrorHandler } from './interface';
export { NoopReporter } from './noop';
export { LoggingReporter } from './logging';
export { InMemoryReporter } from './memory';
export { BatchingReporter } from './batching';
export type { BatchingReporterOptions, OverflowPolicy, ReporterStats } from './batching';
export {
  CircuitBreaker,
  CircuitState,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from './circuit-breaker';
export type { CircuitBreakerConfig } from './circuit-breaker';
