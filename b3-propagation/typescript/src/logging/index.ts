/**
 * Logging module exports
 */

export type { Logger, LogLevel, LogFormat, LoggingConfig } from './logger';
export { ConsoleLogger, NoopLogger, createDefaultLoggingConfig } from './logger';
export type { LogContext } from './correlation';
export { getLogContext, injectTraceContext } from './correlation';
