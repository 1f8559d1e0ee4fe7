import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Logger } from '../../src/logging';
import type { Span } from '../../src/tracing';
import type { FinishedSpan } from '../../src/types';

export type MockLogger = { [K in keyof Logger]: Mock };

/**
 * Logger whose methods are spies
 */
export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/**
 * Unwrap a successful finish()
 */
export function finishedSpan(span: Span, finishTime?: number): FinishedSpan {
  const result = span.finish(finishTime);
  if (!result.ok) {
    throw result.error;
  }
  return result.span;
}
