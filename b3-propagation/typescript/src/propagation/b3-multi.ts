/**
 * B3 multi-header propagation: one header per field.
 */

import type { SpanContext } from '../context';
import { MalformedContextError, toError } from '../errors';
import { parseSpanId, parseTraceId } from '../ids';
import { SamplingDecision } from '../types';
import type { Carrier } from './header-carrier';

/**
 * B3 header constants
 */
export const X_B3_TRACE_ID = 'X-B3-TraceId';
export const X_B3_SPAN_ID = 'X-B3-SpanId';
export const X_B3_PARENT_SPAN_ID = 'X-B3-ParentSpanId';
export const X_B3_SAMPLED = 'X-B3-Sampled';
export const X_B3_FLAGS = 'X-B3-Flags';

/**
 * Identity fields read from a carrier, before baggage is attached
 */
export interface B3Fields {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  sampling: SamplingDecision;
  debug: boolean;
}

/**
 * Inject B3 multi headers into carrier
 */
export function injectB3MultiContext(carrier: Carrier, context: SpanContext): void {
  carrier.set(X_B3_TRACE_ID, context.traceId);
  carrier.set(X_B3_SPAN_ID, context.spanId);

  if (context.parentSpanId) {
    carrier.set(X_B3_PARENT_SPAN_ID, context.parentSpanId);
  }

  // Debug implies sampled; B3 says not to send both
  if (context.debug) {
    carrier.set(X_B3_FLAGS, '1');
  } else if (context.sampling !== SamplingDecision.DEFERRED) {
    carrier.set(X_B3_SAMPLED, context.isSampled ? '1' : '0');
  }
}

/**
 * Extract B3 multi headers from carrier.
 *
 * @returns null when no X-B3-TraceId header is present
 * @throws MalformedContextError when the headers are present but invalid
 */
export function extractB3MultiContext(carrier: Carrier): B3Fields | null {
  const rawTraceId = carrier.get(X_B3_TRACE_ID);
  if (rawTraceId === null) {
    return null;
  }

  const rawSpanId = carrier.get(X_B3_SPAN_ID);
  if (rawSpanId === null) {
    throw MalformedContextError.missingHeader(X_B3_SPAN_ID);
  }

  const traceId = parseHeaderId(X_B3_TRACE_ID, rawTraceId.trim(), parseTraceId);
  const spanId = parseHeaderId(X_B3_SPAN_ID, rawSpanId.trim(), parseSpanId);

  const rawParent = carrier.get(X_B3_PARENT_SPAN_ID);
  const parentSpanId = rawParent !== null
    ? parseHeaderId(X_B3_PARENT_SPAN_ID, rawParent.trim(), parseSpanId)
    : undefined;

  if (parentSpanId === spanId) {
    throw new MalformedContextError(X_B3_PARENT_SPAN_ID, 'parent span ID equals span ID', {
      details: { spanId },
    });
  }

  const debug = parseFlags(carrier.get(X_B3_FLAGS));
  const sampling = parseSampledHeader(carrier.get(X_B3_SAMPLED));

  if (debug && sampling === SamplingDecision.NOT_SAMPLED) {
    throw new MalformedContextError(X_B3_SAMPLED, 'debug flag set on an unsampled trace');
  }

  return {
    traceId,
    spanId,
    parentSpanId,
    sampling: debug ? SamplingDecision.SAMPLED : sampling,
    debug,
  };
}

/**
 * Parse an identifier header, turning identifier errors into MalformedContextError
 */
export function parseHeaderId(
  header: string,
  value: string,
  parse: (value: string) => string
): string {
  try {
    return parse(value);
  } catch (error) {
    throw MalformedContextError.invalidIdentifier(header, value, toError(error));
  }
}

/**
 * X-B3-Sampled accepts "1"/"0" and the legacy "true"/"false"
 */
function parseSampledHeader(value: string | null): SamplingDecision {
  if (value === null) {
    return SamplingDecision.DEFERRED;
  }

  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
      return SamplingDecision.SAMPLED;
    case '0':
    case 'false':
      return SamplingDecision.NOT_SAMPLED;
    default:
      throw MalformedContextError.invalidSampled(X_B3_SAMPLED, value);
  }
}

function parseFlags(value: string | null): boolean {
  if (value === null) {
    return false;
  }

  const trimmed = value.trim();
  if (trimmed === '1') {
    return true;
  }
  if (trimmed === '0') {
    return false;
  }
  throw new MalformedContextError(X_B3_FLAGS, 'invalid flags', { details: { value } });
}
