/**
 * Trace and span identifiers.
 *
 * Identifiers are canonical lowercase hex strings of fixed width: 16 or 32
 * characters for trace IDs, 16 for span IDs. They are drawn from a
 * cryptographic random source because spans are created in many processes
 * with no shared coordination.
 */

import { randomBytes } from 'crypto';
import { InvalidIdentifierError } from '../errors';

/** 64- or 128-bit trace identifier, lowercase hex */
export type TraceId = string;

/** 64-bit span identifier, lowercase hex */
export type SpanId = string;

export const SPAN_ID_LENGTH = 16;
export const TRACE_ID_LENGTHS: ReadonlyArray<number> = [16, 32];

const HEX_PATTERN = /^[0-9a-f]+$/i;
const ZERO_PATTERN = /^0+$/;

function randomHex(bytes: number): string {
  let id = randomBytes(bytes).toString('hex');
  // An all-zero ID is invalid in B3
  while (ZERO_PATTERN.test(id)) {
    id = randomBytes(bytes).toString('hex');
  }
  return id;
}

/**
 * Generate a new trace ID (64-bit unless use128Bit is set)
 */
export function generateTraceId(options?: { use128Bit?: boolean }): TraceId {
  return randomHex(options?.use128Bit ? 16 : 8);
}

/**
 * Generate a new span ID
 */
export function generateSpanId(): SpanId {
  return randomHex(8);
}

/**
 * Lowercase and left-pad an ID to a fixed width
 */
export function formatId(value: string, width: number): string {
  return value.toLowerCase().padStart(width, '0');
}

function checkHex(
  kind: 'trace' | 'span',
  value: string,
  lengths: ReadonlyArray<number>
): string {
  if (!lengths.includes(value.length)) {
    throw new InvalidIdentifierError(
      kind,
      value,
      `expected ${lengths.join(' or ')} hex characters, got ${value.length}`
    );
  }
  if (!HEX_PATTERN.test(value)) {
    throw new InvalidIdentifierError(kind, value, 'contains non-hex characters');
  }
  if (ZERO_PATTERN.test(value)) {
    throw new InvalidIdentifierError(kind, value, 'must not be all zeros');
  }
  return value.toLowerCase();
}

/**
 * Parse a trace ID into canonical form
 *
 * @throws InvalidIdentifierError on wrong length, charset, or an all-zero value
 */
export function parseTraceId(value: string): TraceId {
  return checkHex('trace', value, TRACE_ID_LENGTHS);
}

/**
 * Parse a span ID into canonical form
 *
 * @throws InvalidIdentifierError on wrong length, charset, or an all-zero value
 */
export function parseSpanId(value: string): SpanId {
  return checkHex('span', value, [SPAN_ID_LENGTH]);
}

export function isValidTraceId(value: string): boolean {
  return (
    TRACE_ID_LENGTHS.includes(value.length) &&
    HEX_PATTERN.test(value) &&
    !ZERO_PATTERN.test(value)
  );
}

export function isValidSpanId(value: string): boolean {
  return (
    value.length === SPAN_ID_LENGTH &&
    HEX_PATTERN.test(value) &&
    !ZERO_PATTERN.test(value)
  );
}

/**
 * Lower 64 bits of a trace ID as an unsigned integer
 */
export function lowerTraceIdBits(traceId: TraceId): bigint {
  return BigInt(`0x${traceId.slice(-SPAN_ID_LENGTH)}`);
}
