/**
 * Root sampling policies.
 *
 * A sampler is consulted once per trace, by the first tracer that has to
 * decide. Every descendant context carries that decision unchanged.
 *
 * @module sampling/sampler
 */

import { ConfigurationError } from '../errors';
import { lowerTraceIdBits } from '../ids';
import type { TraceId } from '../ids';
import { SamplingDecision } from '../types';

/**
 * Decision a sampler can return; it never defers
 */
export type RootSamplingDecision = SamplingDecision.SAMPLED | SamplingDecision.NOT_SAMPLED;

export interface Sampler {
  decide(traceId: TraceId, operationName: string): RootSamplingDecision;
}

/**
 * Always or never samples
 */
export class ConstSampler implements Sampler {
  constructor(private readonly sampled: boolean) {}

  decide(_traceId: TraceId, _operationName: string): RootSamplingDecision {
    return this.sampled ? SamplingDecision.SAMPLED : SamplingDecision.NOT_SAMPLED;
  }
}

/**
 * Samples a fixed fraction of traces.
 *
 * The decision is a function of the trace ID's lower 64 bits, so two
 * processes deciding for the same trace agree.
 */
export class ProbabilisticSampler implements Sampler {
  private readonly rate: number;
  private readonly boundary: bigint;

  constructor(rate: number) {
    if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
      throw new ConfigurationError(
        `Invalid sampling rate: must be a number between 0 and 1, got ${rate}`
      );
    }
    this.rate = rate;
    // rate * 2^64, at 53 bits of precision
    this.boundary = BigInt(Math.round(rate * 2 ** 53)) << 11n;
  }

  decide(traceId: TraceId, _operationName: string): RootSamplingDecision {
    return lowerTraceIdBits(traceId) < this.boundary
      ? SamplingDecision.SAMPLED
      : SamplingDecision.NOT_SAMPLED;
  }

  getRate(): number {
    return this.rate;
  }
}

/**
 * Samples at most N traces per second (token bucket)
 */
export class RateLimitingSampler implements Sampler {
  private readonly creditsPerSecond: number;
  private readonly maxBalance: number;
  private balance: number;
  private lastTick: number;

  constructor(
    maxTracesPerSecond: number,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isFinite(maxTracesPerSecond) || maxTracesPerSecond < 0) {
      throw new ConfigurationError(
        `Invalid rate limit: must be a non-negative number, got ${maxTracesPerSecond}`
      );
    }
    this.creditsPerSecond = maxTracesPerSecond;
    this.maxBalance = Math.max(maxTracesPerSecond, 1);
    this.balance = maxTracesPerSecond === 0 ? 0 : this.maxBalance;
    this.lastTick = this.now();
  }

  decide(_traceId: TraceId, _operationName: string): RootSamplingDecision {
    const current = this.now();
    const elapsedSeconds = Math.max(0, current - this.lastTick) / 1000;
    this.lastTick = current;
    this.balance = Math.min(
      this.maxBalance,
      this.balance + elapsedSeconds * this.creditsPerSecond
    );

    if (this.balance >= 1) {
      this.balance -= 1;
      return SamplingDecision.SAMPLED;
    }
    return SamplingDecision.NOT_SAMPLED;
  }
}
