/**
 * B3 single-header propagation:
 * b3: {TraceId}-{SpanId}-{SamplingState}-{ParentSpanId}
 */

import type { SpanContext } from '../context';
import { MalformedContextError } from '../errors';
import { parseSpanId, parseTraceId } from '../ids';
import { SamplingDecision } from '../types';
import type { Carrier } from './header-carrier';
import { parseHeaderId } from './b3-multi';
import type { B3Fields } from './b3-multi';

export const B3_SINGLE = 'b3';

/**
 * A b3 header holding only a sampling state ("0", "1" or "d")
 */
export interface B3SamplingOnly {
  samplingOnly: true;
  sampling: SamplingDecision;
  debug: boolean;
}

/**
 * Format the single b3 header value
 */
export function formatB3Single(context: SpanContext): string {
  let value = `${context.traceId}-${context.spanId}`;

  const state = samplingState(context);
  if (state === null) {
    return value;
  }
  value += `-${state}`;

  if (context.parentSpanId) {
    value += `-${context.parentSpanId}`;
  }
  return value;
}

/**
 * Inject the single b3 header into carrier
 */
export function injectB3SingleContext(carrier: Carrier, context: SpanContext): void {
  carrier.set(B3_SINGLE, formatB3Single(context));
}

/**
 * Parse a single b3 header value
 *
 * @throws MalformedContextError on any invalid field
 */
export function parseB3Single(header: string): B3Fields | B3SamplingOnly {
  const value = header.trim();

  if (value === '0' || value === '1' || value === 'd') {
    const { sampling, debug } = parseSamplingState(value);
    return { samplingOnly: true, sampling, debug };
  }

  const parts = value.split('-');
  if (parts.length < 2 || parts.length > 4) {
    throw new MalformedContextError(B3_SINGLE, 'expected 2 to 4 fields', {
      details: { value },
    });
  }

  const [rawTraceId, rawSpanId, rawState, rawParent] = parts;
  const traceId = parseHeaderId(B3_SINGLE, rawTraceId, parseTraceId);
  const spanId = parseHeaderId(B3_SINGLE, rawSpanId, parseSpanId);
  const { sampling, debug } = rawState !== undefined
    ? parseSamplingState(rawState)
    : { sampling: SamplingDecision.DEFERRED, debug: false };
  const parentSpanId = rawParent !== undefined
    ? parseHeaderId(B3_SINGLE, rawParent, parseSpanId)
    : undefined;

  if (parentSpanId === spanId) {
    throw new MalformedContextError(B3_SINGLE, 'parent span ID equals span ID', {
      details: { spanId },
    });
  }

  return { traceId, spanId, parentSpanId, sampling, debug };
}

/**
 * Extract the single b3 header from carrier
 *
 * @returns null when the header is absent
 */
export function extractB3SingleContext(carrier: Carrier): B3Fields | B3SamplingOnly | null {
  const header = carrier.get(B3_SINGLE);
  if (header === null) {
    return null;
  }
  return parseB3Single(header);
}

export function isSamplingOnly(fields: B3Fields | B3SamplingOnly): fields is B3SamplingOnly {
  return 'samplingOnly' in fields;
}

function samplingState(context: SpanContext): string | null {
  if (context.debug) {
    return 'd';
  }
  switch (context.sampling) {
    case SamplingDecision.SAMPLED:
      return '1';
    case SamplingDecision.NOT_SAMPLED:
      return '0';
    default:
      return null;
  }
}

function parseSamplingState(state: string): { sampling: SamplingDecision; debug: boolean } {
  switch (state) {
    case '1':
      return { sampling: SamplingDecision.SAMPLED, debug: false };
    case '0':
      return { sampling: SamplingDecision.NOT_SAMPLED, debug: false };
    case 'd':
      return { sampling: SamplingDecision.SAMPLED, debug: true };
    default:
      throw MalformedContextError.invalidSampled(B3_SINGLE, state);
  }
}
