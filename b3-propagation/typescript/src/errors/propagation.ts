/**
 * Errors raised while reading identifiers and trace context.
 */

import { TracingError } from './base';

/**
 * Error thrown when a trace or span identifier cannot be parsed
 */
export class InvalidIdentifierError extends TracingError {
  constructor(
    kind: 'trace' | 'span',
    value: string,
    reason: string
  ) {
    super({
      category: 'validation',
      message: `Invalid ${kind} ID "${value}": ${reason}`,
      details: { kind, value, reason },
    });
    this.name = 'InvalidIdentifierError';
  }
}

/**
 * Error thrown when a span context is built from inconsistent values.
 * This is a programmer error, never raised by extraction.
 */
export class InvalidSpanContextError extends TracingError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super({
      category: 'validation',
      message: `Invalid span context: ${reason}`,
      details,
    });
    this.name = 'InvalidSpanContextError';
  }
}

/**
 * No propagation headers were found in the carrier.
 * Callers start a root span instead.
 */
export class NoContextFoundError extends TracingError {
  constructor(details?: Record<string, unknown>) {
    super({
      category: 'propagation',
      message: 'No trace context found in carrier',
      details,
    });
    this.name = 'NoContextFoundError';
  }
}

/**
 * Propagation headers are present but cannot be parsed
 */
export class MalformedContextError extends TracingError {
  public readonly header: string;

  constructor(
    header: string,
    reason: string,
    options?: { details?: Record<string, unknown>; cause?: Error }
  ) {
    super({
      category: 'propagation',
      message: `Malformed trace context in ${header}: ${reason}`,
      details: { header, reason, ...options?.details },
      cause: options?.cause,
    });
    this.name = 'MalformedContextError';
    this.header = header;
  }

  /**
   * Identifier header with the wrong length or charset
   */
  static invalidIdentifier(header: string, value: string, cause?: Error): MalformedContextError {
    return new MalformedContextError(header, 'invalid identifier', {
      details: { value },
      cause,
    });
  }

  /**
   * Required header missing while its counterpart is present
   */
  static missingHeader(header: string): MalformedContextError {
    return new MalformedContextError(header, 'header is missing');
  }

  /**
   * Sampling value that is neither "0" nor "1"
   */
  static invalidSampled(header: string, value: string): MalformedContextError {
    return new MalformedContextError(header, 'invalid sampling state', {
      details: { value },
    });
  }
}
