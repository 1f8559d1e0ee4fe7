/**
 * Batching reporter: a bounded queue drained asynchronously into a sender.
 *
 * report() only enqueues, so backend latency or failure never reaches the
 * instrumented request path. When the queue is full the configured
 * overflow policy drops a span and the drop is counted.
 */

import {
  QueueOverflowError,
  ReporterUnavailableError,
  toError,
} from '../errors';
import type { TracingError } from '../errors';
import type { Logger } from '../logging';
import { NoopLogger } from '../logging';
import type { FinishedSpan } from '../types';
import { CircuitBreaker } from './circuit-breaker';
import type { CircuitBreakerConfig, CircuitState } from './circuit-breaker';
import type { Reporter, ReportErrorHandler, SpanSender } from './interface';

/**
 * drop-newest keeps the queue as it is and rejects the incoming span;
 * drop-oldest evicts the head of the queue to make room.
 */
export type OverflowPolicy = 'drop-newest' | 'drop-oldest';

export interface BatchingReporterOptions {
  /**
   * Maximum queued spans
   * @default 1000
   */
  maxQueueSize?: number;

  /**
   * Maximum spans per send
   * @default 100
   */
  maxBatchSize?: number;

  /**
   * Interval between background flushes in ms; 0 disables the timer
   * @default 1000
   */
  flushIntervalMs?: number;

  /**
   * Time allowed for one send in ms
   * @default 5000
   */
  sendTimeoutMs?: number;

  /**
   * @default 'drop-newest'
   */
  overflowPolicy?: OverflowPolicy;

  circuitBreaker?: Partial<CircuitBreakerConfig>;

  logger?: Logger;

  /**
   * Receives overflow and delivery errors (defaults to logging at warn)
   */
  onError?: ReportErrorHandler;

  /** Clock used by the circuit breaker */
  now?: () => number;
}

export interface ReporterStats {
  queued: number;
  enqueued: number;
  sent: number;
  droppedOverflow: number;
  droppedSendFailure: number;
  droppedUnavailable: number;
  circuitState: CircuitState;
}

export class BatchingReporter implements Reporter {
  private readonly sender: SpanSender;
  private readonly maxQueueSize: number;
  private readonly maxBatchSize: number;
  private readonly sendTimeoutMs: number;
  private readonly overflowPolicy: OverflowPolicy;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly onError: ReportErrorHandler;
  private readonly queue: FinishedSpan[] = [];
  private timer?: NodeJS.Timeout;
  private flushing: Promise<void> = Promise.resolve();
  private isClosed = false;

  private enqueued = 0;
  private sent = 0;
  private droppedOverflow = 0;
  private droppedSendFailure = 0;
  private droppedUnavailable = 0;

  constructor(sender: SpanSender, options?: BatchingReporterOptions) {
    this.sender = sender;
    this.maxQueueSize = options?.maxQueueSize ?? 1000;
    this.maxBatchSize = options?.maxBatchSize ?? 100;
    this.sendTimeoutMs = options?.sendTimeoutMs ?? 5000;
    this.overflowPolicy = options?.overflowPolicy ?? 'drop-newest';
    this.breaker = new CircuitBreaker(options?.circuitBreaker, options?.now);
    this.logger = options?.logger ?? new NoopLogger();
    this.onError = options?.onError ?? ((error: TracingError) => {
      this.logger.warn(error.message, error.toJSON());
    });

    const flushIntervalMs = options?.flushIntervalMs ?? 1000;
    if (flushIntervalMs > 0) {
      this.timer = setInterval(() => this.triggerFlush(), flushIntervalMs);
      // Never keep the host process alive for tracing
      this.timer.unref();
    }
  }

  report(span: FinishedSpan): void {
    if (this.isClosed) {
      this.droppedUnavailable++;
      this.reportError(new ReporterUnavailableError('reporter is closed', {
        details: { spanId: span.context.spanId },
      }));
      return;
    }

    if (this.queue.length >= this.maxQueueSize) {
      this.droppedOverflow++;
      this.reportError(new QueueOverflowError(this.maxQueueSize, this.overflowPolicy));
      if (this.overflowPolicy === 'drop-newest') {
        return;
      }
      this.queue.shift();
    }

    this.queue.push(span);
    this.enqueued++;

    if (this.queue.length >= this.maxBatchSize) {
      this.triggerFlush();
    }
  }

  /**
   * Send everything queued, one batch at a time. Never rejects.
   */
  flush(): Promise<void> {
    this.flushing = this.flushing
      .then(() => this.drain())
      .catch((error) => {
        this.logger.error('Span flush failed', { error: toError(error).message });
      });
    return this.flushing;
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    await this.flush();
    await this.sender.close();
  }

  getStats(): ReporterStats {
    return {
      queued: this.queue.length,
      enqueued: this.enqueued,
      sent: this.sent,
      droppedOverflow: this.droppedOverflow,
      droppedSendFailure: this.droppedSendFailure,
      droppedUnavailable: this.droppedUnavailable,
      circuitState: this.breaker.getState(),
    };
  }

  private triggerFlush(): void {
    void this.flush();
  }

  private reportError(error: TracingError): void {
    try {
      this.onError(error);
    } catch (handlerError) {
      this.logger.error('Reporter error handler threw', {
        error: toError(handlerError).message,
      });
    }
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.maxBatchSize);
      await this.sendBatch(batch);
    }
  }

  private async sendBatch(batch: FinishedSpan[]): Promise<void> {
    if (!this.breaker.canExecute()) {
      this.droppedUnavailable += batch.length;
      this.reportError(new ReporterUnavailableError('circuit open', {
        details: { dropped: batch.length },
      }));
      return;
    }

    try {
      await this.withTimeout(this.sender.send(batch));
      this.breaker.recordSuccess();
      this.sent += batch.length;
    } catch (error) {
      this.breaker.recordFailure();
      this.droppedSendFailure += batch.length;
      this.reportError(
        error instanceof ReporterUnavailableError
          ? error
          : new ReporterUnavailableError('send failed', {
            details: { dropped: batch.length },
            cause: toError(error),
          })
      );
    }
  }

  private withTimeout(promise: Promise<void>): Promise<void> {
    let timeout: NodeJS.Timeout | undefined;
    const timer = new Promise<never>((_, reject) => {
      timeout = setTimeout(
        () => reject(new ReporterUnavailableError(`send timed out after ${this.sendTimeoutMs}ms`)),
        this.sendTimeoutMs
      );
    });

    return Promise.race([promise, timer]).finally(() => clearTimeout(timeout));
  }
}
