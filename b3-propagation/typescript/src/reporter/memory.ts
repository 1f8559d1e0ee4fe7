/**
 * In-memory reporter for tests and local inspection
 */

import type { FinishedSpan } from '../types';
import type { Reporter } from './interface';

export class InMemoryReporter implements Reporter {
  private spans: FinishedSpan[] = [];
  private isClosed = false;

  report(span: FinishedSpan): void {
    if (this.isClosed) {
      return;
    }
    this.spans.push(span);
  }

  /**
   * Get all reported spans, in report order
   */
  getSpans(): FinishedSpan[] {
    return [...this.spans];
  }

  getSpansByName(name: string): FinishedSpan[] {
    return this.spans.filter((span) => span.operationName === name);
  }

  getSpansByTraceId(traceId: string): FinishedSpan[] {
    return this.spans.filter((span) => span.context.traceId === traceId);
  }

  findBySpanId(spanId: string): FinishedSpan | undefined {
    return this.spans.find((span) => span.context.spanId === spanId);
  }

  clear(): void {
    this.spans = [];
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.isClosed = true;
  }
}
