/**
 * Test fixtures for B3 tracing
 *
 * @module testing/fixtures
 */

import { SpanContext } from '../context';
import type { SpanContextInit } from '../context';
import type { TracingError } from '../errors';
import { InMemoryReporter } from '../reporter';
import { Tracer } from '../tracing';
import type { TracerOptions } from '../tracing';
import { SamplingDecision } from '../types';

export const TEST_TRACE_ID = '463ac35c9f6413ad48485a3953bb6124';
export const TEST_SPAN_ID = 'a2fb4a1d1a96d312';
export const TEST_PARENT_SPAN_ID = '0020000000000001';

/**
 * Create a span context fixture
 */
export function createSpanContextFixture(overrides?: Partial<SpanContextInit>): SpanContext {
  return new SpanContext({
    traceId: TEST_TRACE_ID,
    spanId: TEST_SPAN_ID,
    sampling: SamplingDecision.SAMPLED,
    ...overrides,
  });
}

/**
 * Create B3 multi headers fixture
 */
export function createB3HeadersFixture(
  overrides?: Record<string, string>
): Record<string, string> {
  return {
    'X-B3-TraceId': TEST_TRACE_ID,
    'X-B3-SpanId': TEST_SPAN_ID,
    'X-B3-ParentSpanId': TEST_PARENT_SPAN_ID,
    'X-B3-Sampled': '1',
    ...overrides,
  };
}

export interface TestTracer {
  tracer: Tracer;
  reporter: InMemoryReporter;
  /** Errors routed to the tracer's error handler */
  errors: TracingError[];
}

/**
 * Create a tracer that reports into memory and records its errors
 */
export function createTestTracer(
  options?: Partial<Omit<TracerOptions, 'reporter' | 'onError'>>
): TestTracer {
  const reporter = new InMemoryReporter();
  const errors: TracingError[] = [];
  const tracer = new Tracer({
    serviceName: 'test-service',
    ...options,
    reporter,
    onError: (error) => errors.push(error),
  });
  return { tracer, reporter, errors };
}
