/**
 * B3 propagator - the carrier codec between SpanContext and headers.
 *
 * The codec is a symmetric wire transform: the span ID it writes is the
 * span ID it reads back. Turning a caller's span ID into the parent of a
 * local span is the Tracer's job.
 */

import { SpanContext } from '../context';
import { NoContextFoundError } from '../errors';
import type { Logger } from '../logging';
import { NoopLogger } from '../logging';
import type { HeaderRecord } from '../types';
import type { Carrier } from './header-carrier';
import { toCarrier } from './header-carrier';
import {
  X_B3_TRACE_ID,
  injectB3MultiContext,
  extractB3MultiContext,
} from './b3-multi';
import type { B3Fields } from './b3-multi';
import {
  B3_SINGLE,
  injectB3SingleContext,
  extractB3SingleContext,
  isSamplingOnly,
} from './b3-single';
import {
  DEFAULT_BAGGAGE_LIMITS,
  applyBaggageLimits,
  baggageEntries,
  extractBaggage,
  injectBaggage,
} from './baggage';
import type { BaggageLimits } from './baggage';

/**
 * Which B3 header form to write. Extraction always understands both.
 */
export type B3Format = 'multi' | 'single' | 'both';

export interface B3PropagatorOptions {
  /** Header form written by inject (defaults to 'multi') */
  format?: B3Format;
  /** Baggage caps */
  baggage?: Partial<BaggageLimits>;
  /** Logger for skipped baggage */
  logger?: Logger;
}

/**
 * B3Propagator injects and extracts span contexts
 */
export class B3Propagator {
  readonly format: B3Format;
  readonly baggageLimits: BaggageLimits;
  private readonly logger: Logger;

  constructor(options?: B3PropagatorOptions) {
    this.format = options?.format ?? 'multi';
    this.baggageLimits = { ...DEFAULT_BAGGAGE_LIMITS, ...options?.baggage };
    this.logger = options?.logger ?? new NoopLogger();
  }

  /**
   * Inject context into carrier. Never throws.
   */
  inject(context: SpanContext, carrier: Carrier | HeaderRecord): void {
    const target = toCarrier(carrier);

    if (this.format !== 'single') {
      injectB3MultiContext(target, context);
    }
    if (this.format !== 'multi') {
      injectB3SingleContext(target, context);
    }

    const { items, dropped } = applyBaggageLimits(baggageEntries(context), this.baggageLimits);
    if (dropped.length > 0) {
      this.logger.warn('Baggage items over limit not propagated', {
        traceId: context.traceId,
        dropped,
      });
    }
    injectBaggage(target, items);
  }

  /**
   * Extract context from carrier, multi headers first, then the single b3 header.
   *
   * @throws NoContextFoundError when no trace identifiers are present
   * @throws MalformedContextError when present but invalid
   */
  extract(carrier: Carrier | HeaderRecord): SpanContext {
    const source = toCarrier(carrier);
    const fields = this.extractFields(source);

    const { items, dropped } = applyBaggageLimits(extractBaggage(source), this.baggageLimits);
    if (dropped.length > 0) {
      this.logger.warn('Incoming baggage items over limit ignored', {
        traceId: fields.traceId,
        dropped,
      });
    }

    return new SpanContext({ ...fields, baggage: items });
  }

  private extractFields(carrier: Carrier): B3Fields {
    const multi = extractB3MultiContext(carrier);
    if (multi) {
      return multi;
    }

    const single = extractB3SingleContext(carrier);
    if (single === null) {
      throw new NoContextFoundError({ headers: [X_B3_TRACE_ID, B3_SINGLE] });
    }
    if (isSamplingOnly(single)) {
      throw new NoContextFoundError({
        headers: [X_B3_TRACE_ID, B3_SINGLE],
        sampling: single.sampling,
      });
    }
    return single;
  }
}
