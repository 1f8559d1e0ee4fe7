/**
 * Error classes for trace propagation.
 */

export {
  TracingError,
  isTracingError,
  isErrorCategory,
  toError,
} from './base';
export type { ErrorCategory } from './base';

export {
  InvalidIdentifierError,
  InvalidSpanContextError,
  NoContextFoundError,
  MalformedContextError,
} from './propagation';

export { DoubleFinishError, PostFinishMutationError } from './lifecycle';

export { ReporterUnavailableError, QueueOverflowError } from './reporting';

export { ConfigurationError } from './configuration';
