/**
 * Baggage propagation: one X-Baggage-<key> header per item, value
 * percent-encoded so any string survives an HTTP hop.
 */

import { isValidBaggageKey } from '../context';
import type { SpanContext } from '../context';
import { MalformedContextError, toError } from '../errors';
import type { Carrier } from './header-carrier';

export const BAGGAGE_HEADER_PREFIX = 'X-Baggage-';

/**
 * Caps on propagated baggage. Items past a cap are skipped, on both
 * inject and extract.
 */
export interface BaggageLimits {
  /** Maximum number of items */
  maxItems: number;
  /** Maximum length of a single value, in characters */
  maxValueLength: number;
  /** Maximum sum of key and value lengths over all items */
  maxTotalLength: number;
}

export const DEFAULT_BAGGAGE_LIMITS: BaggageLimits = {
  maxItems: 64,
  maxValueLength: 4096,
  maxTotalLength: 8192,
};

/**
 * Items kept and skipped under a set of limits
 */
export interface LimitedBaggage {
  items: Array<[string, string]>;
  dropped: string[];
}

/**
 * Apply baggage limits in iteration order
 */
export function applyBaggageLimits(
  entries: Iterable<readonly [string, string]>,
  limits: BaggageLimits
): LimitedBaggage {
  const items: Array<[string, string]> = [];
  const dropped: string[] = [];
  let total = 0;

  for (const [key, value] of entries) {
    const size = key.length + value.length;
    if (
      items.length >= limits.maxItems ||
      value.length > limits.maxValueLength ||
      total + size > limits.maxTotalLength
    ) {
      dropped.push(key);
      continue;
    }
    items.push([key, value]);
    total += size;
  }

  return { items, dropped };
}

/**
 * Write baggage headers for the given items
 */
export function injectBaggage(carrier: Carrier, items: Iterable<readonly [string, string]>): void {
  for (const [key, value] of items) {
    carrier.set(`${BAGGAGE_HEADER_PREFIX}${key}`, encodeURIComponent(value));
  }
}

/**
 * Read every X-Baggage-* header, in carrier order
 *
 * @throws MalformedContextError for an empty or invalid key, or a value
 *   that is not valid percent-encoding
 */
export function extractBaggage(carrier: Carrier): Array<[string, string]> {
  const prefix = BAGGAGE_HEADER_PREFIX.toLowerCase();
  const items: Array<[string, string]> = [];

  for (const header of carrier.keys()) {
    if (!header.toLowerCase().startsWith(prefix)) {
      continue;
    }

    const key = header.slice(prefix.length).toLowerCase();
    if (!isValidBaggageKey(key)) {
      throw new MalformedContextError(header, 'invalid baggage key');
    }

    const raw = carrier.get(header);
    if (raw === null) {
      continue;
    }

    try {
      items.push([key, decodeURIComponent(raw)]);
    } catch (error) {
      throw new MalformedContextError(header, 'invalid percent-encoding', {
        details: { value: raw },
        cause: toError(error),
      });
    }
  }

  return items;
}

/**
 * Baggage entries of a context
 */
export function baggageEntries(context: SpanContext): Iterable<readonly [string, string]> {
  return context.baggage.entries();
}
