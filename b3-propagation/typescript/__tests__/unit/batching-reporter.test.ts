import { describe, it, expect, afterEach } from 'vitest';
import {
  QueueOverflowError,
  ReporterUnavailableError,
} from '../../src/errors';
import type { TracingError } from '../../src/errors';
import { BatchingReporter, CircuitBreaker, CircuitState } from '../../src/reporter';
import type { BatchingReporterOptions, SpanSender } from '../../src/reporter';
import { createTestTracer } from '../../src/testing';
import type { FinishedSpan } from '../../src/types';
import { createMockLogger, finishedSpan } from './helpers';

/**
 * Sender that records batches and fails on demand
 */
class RecordingSender implements SpanSender {
  readonly batches: string[][] = [];
  failWith?: Error;
  closed = false;

  async send(spans: ReadonlyArray<FinishedSpan>): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.batches.push(spans.map((span) => span.operationName));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function span(name: string): FinishedSpan {
  const { tracer } = createTestTracer();
  return finishedSpan(tracer.startSpan(name));
}

describe('BatchingReporter', () => {
  let reporter: BatchingReporter | undefined;
  let sender: RecordingSender;
  let errors: TracingError[];

  function createReporter(options?: BatchingReporterOptions): BatchingReporter {
    sender = new RecordingSender();
    errors = [];
    reporter = new BatchingReporter(sender, {
      flushIntervalMs: 0,
      onError: (error) => errors.push(error),
      ...options,
    });
    return reporter;
  }

  afterEach(async () => {
    await reporter?.close();
    reporter = undefined;
  });

  it('sends queued spans on flush', async () => {
    const batching = createReporter();
    batching.report(span('a'));
    batching.report(span('b'));

    expect(sender.batches).toEqual([]);

    await batching.flush();

    expect(sender.batches).toEqual([['a', 'b']]);
    expect(batching.getStats()).toEqual({
      queued: 0,
      enqueued: 2,
      sent: 2,
      droppedOverflow: 0,
      droppedSendFailure: 0,
      droppedUnavailable: 0,
      circuitState: CircuitState.CLOSED,
    });
  });

  it('splits the queue into batches of maxBatchSize', async () => {
    const batching = createReporter({ maxBatchSize: 2 });
    batching.report(span('a'));
    batching.report(span('b'));
    batching.report(span('c'));

    await batching.flush();

    expect(sender.batches).toEqual([['a', 'b'], ['c']]);
  });

  it('flushes on its own once a batch is full', async () => {
    const batching = createReporter({ maxBatchSize: 2 });
    batching.report(span('a'));
    batching.report(span('b'));

    await new Promise((resolve) => setImmediate(resolve));

    expect(sender.batches).toEqual([['a', 'b']]);
  });

  it('flushes on the interval timer', async () => {
    const batching = createReporter({ flushIntervalMs: 5 });
    batching.report(span('a'));

    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(sender.batches).toEqual([['a']]);
  });

  it('drops the newest span when the queue is full', async () => {
    const batching = createReporter({ maxQueueSize: 2, maxBatchSize: 10 });
    batching.report(span('a'));
    batching.report(span('b'));
    batching.report(span('c'));

    await batching.flush();

    expect(sender.batches).toEqual([['a', 'b']]);
    expect(batching.getStats().droppedOverflow).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(QueueOverflowError);
    expect(errors[0].message).toBe('Span queue full (2), dropped newest span');
  });

  it('drops the oldest span under drop-oldest', async () => {
    const batching = createReporter({
      maxQueueSize: 2,
      maxBatchSize: 10,
      overflowPolicy: 'drop-oldest',
    });
    batching.report(span('a'));
    batching.report(span('b'));
    batching.report(span('c'));

    await batching.flush();

    expect(sender.batches).toEqual([['b', 'c']]);
    expect(batching.getStats()).toMatchObject({ enqueued: 3, sent: 2, droppedOverflow: 1 });
    expect(errors[0].message).toBe('Span queue full (2), dropped oldest span');
  });

  it('counts and reports a failed send without rejecting', async () => {
    const batching = createReporter();
    sender.failWith = new Error('connection refused');
    batching.report(span('a'));

    await expect(batching.flush()).resolves.toBeUndefined();

    expect(batching.getStats()).toMatchObject({ sent: 0, droppedSendFailure: 1, queued: 0 });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ReporterUnavailableError);
    expect(errors[0].message).toBe('Reporter unavailable: send failed');
    expect(errors[0].cause?.message).toBe('connection refused');
  });

  it('passes sender errors through unchanged', async () => {
    const batching = createReporter();
    const failure = ReporterUnavailableError.httpStatus(503, 'http://zipkin.test/api/v2/spans');
    sender.failWith = failure;
    batching.report(span('a'));

    await batching.flush();

    expect(errors).toEqual([failure]);
  });

  it('times out a send that never settles', async () => {
    const batching = createReporter({ sendTimeoutMs: 10 });
    sender.send = () => new Promise<void>(() => {});
    batching.report(span('a'));

    await batching.flush();

    expect(batching.getStats().droppedSendFailure).toBe(1);
    expect(errors[0].message).toBe('Reporter unavailable: send timed out after 10ms');
  });

  it('stops sending while the circuit is open and retries after the reset timeout', async () => {
    let now = 0;
    const batching = createReporter({
      circuitBreaker: { failureThreshold: 1, resetTimeoutMs: 1000 },
      now: () => now,
    });

    sender.failWith = new Error('connection refused');
    batching.report(span('a'));
    await batching.flush();
    expect(batching.getStats().circuitState).toBe(CircuitState.OPEN);

    sender.failWith = undefined;
    batching.report(span('b'));
    await batching.flush();
    expect(sender.batches).toEqual([]);
    expect(batching.getStats().droppedUnavailable).toBe(1);
    expect(errors[1].message).toBe('Reporter unavailable: circuit open');

    now = 1000;
    batching.report(span('c'));
    await batching.flush();
    expect(sender.batches).toEqual([['c']]);
    expect(batching.getStats().circuitState).toBe(CircuitState.CLOSED);
  });

  it('keeps sending after the error handler throws', async () => {
    const logger = createMockLogger();
    const batching = createReporter({
      logger,
      onError: () => {
        throw new Error('handler bug');
      },
    });
    sender.failWith = new Error('connection refused');
    batching.report(span('a'));

    await expect(batching.flush()).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Reporter error handler threw', {
      error: 'handler bug',
    });

    sender.failWith = undefined;
    batching.report(span('b'));
    await expect(batching.flush()).resolves.toBeUndefined();

    expect(sender.batches).toEqual([['b']]);
    expect(batching.getStats()).toMatchObject({ queued: 0, sent: 1, droppedSendFailure: 1 });
  });

  it('never throws from report when the error handler throws', () => {
    const batching = createReporter({
      maxQueueSize: 1,
      maxBatchSize: 10,
      logger: createMockLogger(),
      onError: () => {
        throw new Error('handler bug');
      },
    });
    batching.report(span('a'));

    expect(() => batching.report(span('b'))).not.toThrow();
    expect(batching.getStats().droppedOverflow).toBe(1);
  });

  it('flushes and closes the sender on close', async () => {
    const batching = createReporter();
    batching.report(span('a'));

    await batching.close();

    expect(sender.batches).toEqual([['a']]);
    expect(sender.closed).toBe(true);
  });

  it('drops spans reported after close', async () => {
    const batching = createReporter();
    await batching.close();

    batching.report(span('late'));

    expect(batching.getStats().droppedUnavailable).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Reporter unavailable: reporter is closed');
  });
});

describe('CircuitBreaker', () => {
  it('opens after the failure threshold', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3 });

    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);

    breaker.recordFailure();
    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.canExecute()).toBe(false);
  });

  it('allows one trial after the reset timeout', () => {
    let now = 0;
    const breaker = new CircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 100 }, () => now);
    breaker.recordFailure();

    now = 100;
    expect(breaker.canExecute()).toBe(true);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    expect(breaker.canExecute()).toBe(false);
  });

  it('reopens when the trial fails', () => {
    let now = 0;
    const breaker = new CircuitBreaker({ failureThreshold: 2, resetTimeoutMs: 100 }, () => now);
    breaker.recordFailure();
    breaker.recordFailure();

    now = 150;
    breaker.canExecute();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('resets the failure count on success', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});
