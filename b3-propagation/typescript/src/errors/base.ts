/**
 * Base error class for all tracing errors.
 *
 * Provides structured error information with a category and optional
 * cause tracking.
 */

/**
 * Error category for classifying tracing errors
 */
export type ErrorCategory =
  | 'propagation'
  | 'lifecycle'
  | 'reporting'
  | 'configuration'
  | 'validation';

/**
 * Base error class for all tracing errors.
 *
 * None of these is fatal to the host application: propagation errors are
 * returned to the caller, lifecycle and reporting errors go to the
 * tracer's error handler.
 */
export abstract class TracingError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  declare readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message);
    this.name = 'TracingError';
    this.category = options.category;
    this.details = options.details;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Returns a human-readable string representation of the error
   */
  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is a TracingError
 */
export function isTracingError(error: unknown): error is TracingError {
  return error instanceof TracingError;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(
  error: unknown,
  category: ErrorCategory
): boolean {
  return isTracingError(error) && error.category === category;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
