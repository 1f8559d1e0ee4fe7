/**
 * SpanContext - immutable identity of a span, as propagated between services.
 */

import { InvalidSpanContextError } from '../errors';
import { parseSpanId, parseTraceId } from '../ids';
import type { SpanId, TraceId } from '../ids';
import { SamplingDecision } from '../types/span';

/**
 * Baggage keys travel as header-name suffixes, so they must be header tokens
 */
const BAGGAGE_KEY_PATTERN = /^[a-z0-9!#$%&'*+.^_`|~-]+$/;

/**
 * A high surrogate not followed by a low one, or a low surrogate not
 * preceded by a high one. Such values cannot be percent-encoded.
 */
const LONE_SURROGATE_PATTERN = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export interface SpanContextInit {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  sampling?: SamplingDecision;
  /** B3 debug flag; implies SAMPLED */
  debug?: boolean;
  baggage?: Iterable<readonly [string, string]> | Record<string, string>;
}

/**
 * Whether a (lowercased) key can be carried as baggage
 */
export function isValidBaggageKey(key: string): boolean {
  return BAGGAGE_KEY_PATTERN.test(key);
}

function normalizeBaggageKey(key: string): string {
  const normalized = key.toLowerCase();
  if (!isValidBaggageKey(normalized)) {
    throw new InvalidSpanContextError(`invalid baggage key "${key}"`, { key });
  }
  return normalized;
}

function checkBaggageValue(key: string, value: string): string {
  if (LONE_SURROGATE_PATTERN.test(value)) {
    throw new InvalidSpanContextError(`baggage value of "${key}" is not well-formed UTF-16`, { key });
  }
  return value;
}

function isIterable(
  value: Iterable<readonly [string, string]> | Record<string, string>
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}

/**
 * Immutable span context.
 *
 * Contexts are shared freely between concurrent child-span creations, so
 * every "mutating" method returns a new instance.
 */
export class SpanContext {
  readonly traceId: TraceId;
  readonly spanId: SpanId;
  readonly parentSpanId?: SpanId;
  readonly sampling: SamplingDecision;
  readonly debug: boolean;
  private readonly items: ReadonlyMap<string, string>;

  constructor(init: SpanContextInit) {
    this.traceId = parseTraceId(init.traceId);
    this.spanId = parseSpanId(init.spanId);
    this.parentSpanId =
      init.parentSpanId !== undefined ? parseSpanId(init.parentSpanId) : undefined;
    this.debug = init.debug ?? false;
    this.sampling = this.debug
      ? SamplingDecision.SAMPLED
      : init.sampling ?? SamplingDecision.DEFERRED;

    if (this.parentSpanId === this.spanId) {
      throw new InvalidSpanContextError('parent span ID equals span ID', {
        spanId: this.spanId,
      });
    }
    if (this.debug && init.sampling === SamplingDecision.NOT_SAMPLED) {
      throw new InvalidSpanContextError('debug context cannot be unsampled');
    }

    const items = new Map<string, string>();
    if (init.baggage) {
      const entries = isIterable(init.baggage)
        ? init.baggage
        : Object.entries(init.baggage);
      for (const [key, value] of entries) {
        items.set(normalizeBaggageKey(key), checkBaggageValue(key, value));
      }
    }
    this.items = items;
    Object.freeze(this);
  }

  /**
   * True when this context belongs to the first span of a trace
   */
  get isRoot(): boolean {
    return this.parentSpanId === undefined;
  }

  get isSampled(): boolean {
    return this.sampling === SamplingDecision.SAMPLED;
  }

  /**
   * Baggage items in insertion order
   */
  get baggage(): ReadonlyMap<string, string> {
    return this.items;
  }

  getBaggageItem(key: string): string | undefined {
    return this.items.get(key.toLowerCase());
  }

  baggageItems(): Record<string, string> {
    return Object.fromEntries(this.items);
  }

  /**
   * Copy of this context with one baggage item added or replaced
   */
  withBaggageItem(key: string, value: string): SpanContext {
    const items = new Map(this.items);
    items.set(normalizeBaggageKey(key), checkBaggageValue(key, value));
    return this.copy({ baggage: items });
  }

  /**
   * Copy of this context without the given baggage item
   */
  withoutBaggageItem(key: string): SpanContext {
    const normalized = key.toLowerCase();
    if (!this.items.has(normalized)) {
      return this;
    }
    const items = new Map(this.items);
    items.delete(normalized);
    return this.copy({ baggage: items });
  }

  /**
   * Copy of this context carrying a different sampling decision
   */
  withSampling(sampling: SamplingDecision): SpanContext {
    if (sampling === this.sampling) {
      return this;
    }
    return this.copy({ sampling, debug: false });
  }

  toJSON(): Record<string, unknown> {
    return {
      traceId: this.traceId,
      spanId: this.spanId,
      parentSpanId: this.parentSpanId,
      sampling: this.sampling,
      debug: this.debug,
      baggage: this.baggageItems(),
    };
  }

  private copy(overrides: Partial<SpanContextInit>): SpanContext {
    return new SpanContext({
      traceId: this.traceId,
      spanId: this.spanId,
      parentSpanId: this.parentSpanId,
      sampling: this.sampling,
      debug: this.debug,
      baggage: this.items,
      ...overrides,
    });
  }
}
