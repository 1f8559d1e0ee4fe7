/**
 * Reporter that writes finished spans to a logger
 */

import type { Logger } from '../logging';
import type { FinishedSpan } from '../types';
import type { Reporter } from './interface';

export class LoggingReporter implements Reporter {
  constructor(private readonly logger: Logger) {}

  report(span: FinishedSpan): void {
    this.logger.info('Span finished', {
      service: span.serviceName,
      operation: span.operationName,
      kind: span.kind,
      traceId: span.context.traceId,
      spanId: span.context.spanId,
      parentSpanId: span.context.parentSpanId,
      durationMs: span.duration,
      tags: span.tags,
    });
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}
