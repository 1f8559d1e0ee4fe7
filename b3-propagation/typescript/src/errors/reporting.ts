/**
 * Delivery errors. Spans involved are dropped and counted.
 */

import { TracingError } from './base';

/**
 * The reporter or its backend could not accept spans
 */
export class ReporterUnavailableError extends TracingError {
  constructor(
    reason: string,
    options?: { details?: Record<string, unknown>; cause?: Error }
  ) {
    super({
      category: 'reporting',
      message: `Reporter unavailable: ${reason}`,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'ReporterUnavailableError';
  }

  /**
   * Backend answered with a non-success HTTP status
   */
  static httpStatus(statusCode: number, endpoint: string): ReporterUnavailableError {
    return new ReporterUnavailableError(`HTTP ${statusCode}`, {
      details: { statusCode, endpoint },
    });
  }
}

/**
 * The reporter queue is full and the overflow policy dropped a span
 */
export class QueueOverflowError extends TracingError {
  constructor(maxQueueSize: number, policy: string) {
    super({
      category: 'reporting',
      message: `Span queue full (${maxQueueSize}), dropped ${policy === 'drop-oldest' ? 'oldest' : 'newest'} span`,
      details: { maxQueueSize, policy },
    });
    this.name = 'QueueOverflowError';
  }
}
