/**
 * Wires a Tracer from validated configuration.
 */

import type { Dispatcher } from 'undici';
import type { SamplerConfig, TracingConfig } from '../config';
import type { Logger } from '../logging';
import { ConsoleLogger } from '../logging';
import { B3Propagator } from '../propagation';
import {
  BatchingReporter,
  LoggingReporter,
  NoopReporter,
} from '../reporter';
import type { Reporter, SpanSender } from '../reporter';
import {
  ConstSampler,
  ProbabilisticSampler,
  RateLimitingSampler,
} from '../sampling';
import type { Sampler } from '../sampling';
import { Tracer } from '../tracing';
import { ZipkinHttpSender } from '../zipkin';

/**
 * Collaborators that can be swapped without changing configuration
 */
export interface TracerDependencies {
  logger?: Logger;
  /** Replaces the Zipkin HTTP sender */
  sender?: SpanSender;
  /** undici dispatcher for the Zipkin HTTP sender */
  dispatcher?: Dispatcher;
}

/**
 * Build the sampler described by configuration
 */
export function createSampler(config: SamplerConfig): Sampler {
  switch (config.type) {
    case 'const':
      return new ConstSampler(config.param === 1);
    case 'probabilistic':
      return new ProbabilisticSampler(config.param);
    case 'ratelimiting':
      return new RateLimitingSampler(config.param);
  }
}

function createReporter(
  config: TracingConfig,
  logger: Logger,
  deps: TracerDependencies
): Reporter {
  const reporter = config.reporter;

  switch (reporter.type) {
    case 'zipkin':
      return new BatchingReporter(
        deps.sender ?? new ZipkinHttpSender({
          endpoint: reporter.endpoint,
          timeoutMs: reporter.timeoutMs,
          dispatcher: deps.dispatcher,
        }),
        {
          maxQueueSize: reporter.maxQueueSize,
          maxBatchSize: reporter.maxBatchSize,
          flushIntervalMs: reporter.flushIntervalMs,
          sendTimeoutMs: reporter.timeoutMs,
          overflowPolicy: reporter.overflowPolicy,
          circuitBreaker: reporter.circuitBreaker,
          logger,
        }
      );
    case 'logging':
      return new LoggingReporter(logger);
    case 'noop':
      return new NoopReporter();
  }
}

/**
 * Create a tracer for one process.
 *
 * @example
 * ```typescript
 * const tracer = createTracer(loadConfig({ serviceName: 'payment-service' }));
 * process.on('SIGTERM', () => void tracer.close());
 * ```
 */
export function createTracer(config: TracingConfig, deps: TracerDependencies = {}): Tracer {
  const logger = deps.logger ?? new ConsoleLogger({ level: config.logLevel, name: 'tracer' });

  return new Tracer({
    serviceName: config.serviceName,
    reporter: createReporter(config, logger, deps),
    sampler: createSampler(config.sampler),
    propagator: new B3Propagator({
      format: config.propagation.format,
      baggage: config.baggage,
      logger,
    }),
    traceId128Bit: config.traceId128Bit,
    tags: config.tags,
    logger,
  });
}
