import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config';
import { createSampler, createTracer } from '../../src/factory';
import type { SpanSender } from '../../src/reporter';
import { ConstSampler, ProbabilisticSampler, RateLimitingSampler } from '../../src/sampling';
import { SamplingDecision } from '../../src/types';
import type { FinishedSpan } from '../../src/types';
import { createMockLogger } from './helpers';

describe('createSampler', () => {
  it('builds each sampler type', () => {
    expect(createSampler({ type: 'const', param: 1 }).decide('463ac35c9f6413ad', 'op')).toBe(
      SamplingDecision.SAMPLED
    );
    expect(createSampler({ type: 'const', param: 0 })).toBeInstanceOf(ConstSampler);

    const probabilistic = createSampler({ type: 'probabilistic', param: 0.3 });
    expect(probabilistic).toBeInstanceOf(ProbabilisticSampler);
    expect(probabilistic).toMatchObject({ rate: 0.3 });

    expect(createSampler({ type: 'ratelimiting', param: 5 })).toBeInstanceOf(RateLimitingSampler);
  });
});

describe('createTracer', () => {
  it('reports through the configured sender', async () => {
    const sent: string[] = [];
    const sender: SpanSender = {
      send: async (spans: ReadonlyArray<FinishedSpan>) => {
        sent.push(...spans.map((span) => `${span.serviceName}/${span.operationName}`));
      },
      close: async () => {},
    };
    const config = loadConfig(
      { serviceName: 'payment-service', reporter: { flushIntervalMs: 0 } },
      {}
    );
    const tracer = createTracer(config, { logger: createMockLogger(), sender });

    tracer.startSpan('charge').finish();
    await tracer.close();

    expect(sent).toEqual(['payment-service/charge']);
  });

  it('applies propagation, sampling and tag settings', () => {
    const config = loadConfig(
      {
        serviceName: 'payment-service',
        propagation: { format: 'single' },
        sampler: { type: 'const', param: 0 },
        reporter: { type: 'noop' },
        tags: { env: 'test' },
        traceId128Bit: true,
      },
      {}
    );
    const tracer = createTracer(config, { logger: createMockLogger() });
    const span = tracer.startSpan('charge');
    const headers: Record<string, string> = {};

    tracer.inject(span.context(), headers);

    expect(span.traceId).toHaveLength(32);
    expect(span.tags).toEqual({ env: 'test' });
    expect(headers).toEqual({ b3: `${span.traceId}-${span.spanId}-0` });
  });

  it('logs finished spans with the logging reporter', () => {
    const logger = createMockLogger();
    const config = loadConfig(
      { serviceName: 'payment-service', reporter: { type: 'logging' } },
      {}
    );
    const tracer = createTracer(config, { logger });

    tracer.startSpan('charge', { startTime: 1000 }).finish(1012);

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info.mock.calls[0][0]).toBe('Span finished');
    expect(logger.info.mock.calls[0][1]).toMatchObject({
      service: 'payment-service',
      operation: 'charge',
      kind: 'internal',
      durationMs: 12,
    });
  });
});
