import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/errors';
import {
  ConstSampler,
  ProbabilisticSampler,
  RateLimitingSampler,
} from '../../src/sampling';
import { SamplingDecision } from '../../src/types';

const { SAMPLED, NOT_SAMPLED } = SamplingDecision;

describe('ConstSampler', () => {
  it('always returns its fixed decision', () => {
    expect(new ConstSampler(true).decide('463ac35c9f6413ad', 'a')).toBe(SAMPLED);
    expect(new ConstSampler(false).decide('463ac35c9f6413ad', 'a')).toBe(NOT_SAMPLED);
  });
});

describe('ProbabilisticSampler', () => {
  it('splits the trace ID space at the rate', () => {
    const sampler = new ProbabilisticSampler(0.5);

    expect(sampler.decide('7fffffffffffffff', 'op')).toBe(SAMPLED);
    expect(sampler.decide('8000000000000000', 'op')).toBe(NOT_SAMPLED);
  });

  it('decides on the lower 64 bits of 128-bit trace IDs', () => {
    const sampler = new ProbabilisticSampler(0.5);

    expect(sampler.decide('ffffffffffffffff0000000000000001', 'op')).toBe(SAMPLED);
    expect(sampler.decide('0000000000000001ffffffffffffffff', 'op')).toBe(NOT_SAMPLED);
  });

  it('gives the same answer for the same trace', () => {
    const first = new ProbabilisticSampler(0.1);
    const second = new ProbabilisticSampler(0.1);

    for (const traceId of ['0a00000000000001', '1999999999999999', 'ffffffffffffffff']) {
      expect(first.decide(traceId, 'a')).toBe(second.decide(traceId, 'b'));
    }
  });

  it('samples everything at rate 1 and nothing at rate 0', () => {
    expect(new ProbabilisticSampler(1).decide('ffffffffffffffff', 'op')).toBe(SAMPLED);
    expect(new ProbabilisticSampler(0).decide('0000000000000001', 'op')).toBe(NOT_SAMPLED);
  });

  it('rejects rates outside 0..1', () => {
    expect(() => new ProbabilisticSampler(1.5)).toThrow(ConfigurationError);
    expect(() => new ProbabilisticSampler(-0.1)).toThrow(ConfigurationError);
    expect(() => new ProbabilisticSampler(Number.NaN)).toThrow(ConfigurationError);
  });

  it('reports its rate', () => {
    expect(new ProbabilisticSampler(0.25).getRate()).toBe(0.25);
  });
});

describe('RateLimitingSampler', () => {
  it('samples up to the limit, then refills over time', () => {
    let now = 0;
    const sampler = new RateLimitingSampler(2, () => now);

    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(SAMPLED);
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(SAMPLED);
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(NOT_SAMPLED);

    now = 500;
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(SAMPLED);
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(NOT_SAMPLED);
  });

  it('never exceeds its burst size after a long idle period', () => {
    let now = 0;
    const sampler = new RateLimitingSampler(1, () => now);
    sampler.decide('463ac35c9f6413ad', 'op');

    now = 60_000;
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(SAMPLED);
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(NOT_SAMPLED);
  });

  it('samples nothing at a limit of zero', () => {
    let now = 0;
    const sampler = new RateLimitingSampler(0, () => now);

    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(NOT_SAMPLED);
    now = 10_000;
    expect(sampler.decide('463ac35c9f6413ad', 'op')).toBe(NOT_SAMPLED);
  });

  it('rejects a negative limit', () => {
    expect(() => new RateLimitingSampler(-1)).toThrow(ConfigurationError);
  });
});
