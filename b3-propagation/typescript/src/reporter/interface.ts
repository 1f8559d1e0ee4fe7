/**
 * Reporter boundary between the tracer and a trace backend.
 */

import type { TracingError } from '../errors';
import type { FinishedSpan } from '../types';

/**
 * Accepts finished spans.
 *
 * report() is fire-and-forget: it must not block on I/O and must not
 * throw into the instrumented code path.
 */
export interface Reporter {
  report(span: FinishedSpan): void;

  /**
   * Deliver everything queued so far
   */
  flush(): Promise<void>;

  /**
   * Flush and release resources; later reports are dropped
   */
  close(): Promise<void>;
}

/**
 * Transport used by BatchingReporter to deliver a batch
 */
export interface SpanSender {
  /**
   * @throws ReporterUnavailableError when the backend refuses or is unreachable
   */
  send(spans: ReadonlyArray<FinishedSpan>): Promise<void>;

  close(): Promise<void>;
}

/**
 * Receives delivery failures; the spans involved are already dropped
 */
export type ReportErrorHandler = (error: TracingError) => void;
