/**
 * Configuration errors
 */

import { TracingError } from './base';

/**
 * Error thrown when tracing configuration is invalid
 */
export class ConfigurationError extends TracingError {
  constructor(
    message: string,
    options?: { details?: Record<string, unknown>; cause?: Error }
  ) {
    super({
      category: 'configuration',
      message,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
  }
}
