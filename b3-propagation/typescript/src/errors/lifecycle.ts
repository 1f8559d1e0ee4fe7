/**
 * Span lifecycle errors. Both are programmer errors: they are reported,
 * the finished span stays as it was.
 */

import { TracingError } from './base';

/**
 * finish() called on a span that is already finished
 */
export class DoubleFinishError extends TracingError {
  constructor(operationName: string, spanId: string) {
    super({
      category: 'lifecycle',
      message: `Span "${operationName}" (${spanId}) is already finished`,
      details: { operationName, spanId },
    });
    this.name = 'DoubleFinishError';
  }
}

/**
 * Tag, log or rename attempted on a finished span
 */
export class PostFinishMutationError extends TracingError {
  constructor(operationName: string, spanId: string, operation: string) {
    super({
      category: 'lifecycle',
      message: `Cannot ${operation} on finished span "${operationName}" (${spanId})`,
      details: { operationName, spanId, operation },
    });
    this.name = 'PostFinishMutationError';
  }
}
