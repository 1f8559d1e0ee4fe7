/**
 * HeaderCarrier - HTTP header carrier implementation for context propagation
 */

import type { HeaderRecord } from '../types';

/**
 * Carrier interface for context propagation
 */
export interface Carrier {
  get(key: string): string | null;
  set(key: string, value: string): void;
  keys(): string[];
}

/**
 * HeaderCarrier implements case-insensitive header storage and retrieval
 * for context propagation across HTTP boundaries.
 *
 * Writes go to the wrapped record, so a caller's outgoing header object
 * can be handed in directly.
 */
export class HeaderCarrier implements Carrier {
  private headers: HeaderRecord;

  constructor(headers?: HeaderRecord) {
    this.headers = headers ?? {};
  }

  /**
   * Get header value with case-insensitive lookup.
   * Repeated headers are joined with a comma.
   */
  get(key: string): string | null {
    const found = this.findKey(key);
    if (found === undefined) {
      return null;
    }

    const value = this.headers[found];
    if (value === undefined) {
      return null;
    }
    return Array.isArray(value) ? value.join(',') : value;
  }

  /**
   * Set header value, replacing any existing header of the same name
   */
  set(key: string, value: string): void {
    const existing = this.findKey(key);
    if (existing !== undefined && existing !== key) {
      delete this.headers[existing];
    }
    this.headers[key] = value;
  }

  keys(): string[] {
    return Object.keys(this.headers).filter((k) => this.headers[k] !== undefined);
  }

  /**
   * Get all headers as object
   */
  toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const key of this.keys()) {
      const value = this.get(key);
      if (value !== null) {
        result[key] = value;
      }
    }
    return result;
  }

  private findKey(key: string): string | undefined {
    const lowerKey = key.toLowerCase();
    return Object.keys(this.headers).find(
      (k) => k.toLowerCase() === lowerKey && this.headers[k] !== undefined
    );
  }
}

/**
 * Wrap a plain header record, pass a Carrier through unchanged
 */
export function toCarrier(carrier: Carrier | HeaderRecord): Carrier {
  return isCarrier(carrier) ? carrier : new HeaderCarrier(carrier);
}

function isCarrier(value: Carrier | HeaderRecord): value is Carrier {
  return typeof value.get === 'function'
    && typeof value.set === 'function'
    && typeof value.keys === 'function';
}
