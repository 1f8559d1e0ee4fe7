/**
 * Tracer - starts spans, moves context across process boundaries and
 * hands finished spans to a reporter.
 *
 * There is no global tracer: construct one at process start and pass it
 * to the code that needs it.
 */

import { SpanContext } from '../context';
import {
  MalformedContextError,
  NoContextFoundError,
  ReporterUnavailableError,
  toError,
} from '../errors';
import type { TracingError } from '../errors';
import { generateSpanId, generateTraceId } from '../ids';
import type { Logger } from '../logging';
import { NoopLogger } from '../logging';
import { B3Propagator } from '../propagation';
import type { Carrier } from '../propagation';
import { NoopReporter } from '../reporter';
import type { Reporter } from '../reporter';
import { ConstSampler } from '../sampling';
import type { RootSamplingDecision, Sampler } from '../sampling';
import { SamplingDecision, SpanKind } from '../types';
import type {
  FinishedSpan,
  HeaderRecord,
  SpanOptions,
  SpanReference,
  Tags,
} from '../types';
import type { Span } from './interface';
import { SpanImpl } from './span';

export interface TracerOptions {
  /** Service name recorded on every span */
  serviceName: string;
  /** Defaults to NoopReporter */
  reporter?: Reporter;
  /** Root sampling policy (defaults to sampling everything) */
  sampler?: Sampler;
  /** Carrier codec (defaults to a multi-header B3Propagator) */
  propagator?: B3Propagator;
  /** Generate 128-bit trace IDs for new traces */
  traceId128Bit?: boolean;
  /** Tags applied to every span */
  tags?: Tags;
  logger?: Logger;
  /**
   * Receives lifecycle and reporting errors (defaults to logging at warn).
   * Must not throw.
   */
  onError?: (error: TracingError) => void;
}

/**
 * Outcome of Tracer.extract()
 */
export type ExtractResult =
  | { ok: true; context: SpanContext }
  | { ok: false; error: NoContextFoundError | MalformedContextError };

export class Tracer {
  readonly serviceName: string;
  private readonly reporter: Reporter;
  private readonly sampler: Sampler;
  private readonly propagator: B3Propagator;
  private readonly traceId128Bit: boolean;
  private readonly tags: Tags;
  private readonly logger: Logger;
  private readonly errorHandler: (error: TracingError) => void;
  /** Decisions taken for deferred parents, so siblings agree */
  private readonly resolved = new WeakMap<SpanContext, RootSamplingDecision>();

  constructor(options: TracerOptions) {
    this.serviceName = options.serviceName;
    this.logger = options.logger ?? new NoopLogger();
    this.reporter = options.reporter ?? new NoopReporter();
    this.sampler = options.sampler ?? new ConstSampler(true);
    this.propagator = options.propagator ?? new B3Propagator({ logger: this.logger });
    this.traceId128Bit = options.traceId128Bit ?? false;
    this.tags = { ...options.tags };
    this.errorHandler = options.onError ?? ((error: TracingError) => {
      this.logger.warn(error.message, error.toJSON());
    });
  }

  /**
   * Start a new span.
   *
   * With a parent (rpcServer, childOf or followsFrom, in that order of
   * precedence) the span joins the parent's trace: same trace ID and
   * baggage, the parent's span ID as parent, the parent's sampling
   * decision. Without one it starts a new trace and the sampler decides.
   *
   * @example
   * ```typescript
   * const incoming = tracer.extract(req.headers);
   * const span = incoming.ok
   *   ? tracer.startSpan('payment.process', { rpcServer: incoming.context })
   *   : tracer.startSpan('payment.process', { kind: SpanKind.SERVER });
   * ```
   */
  startSpan(operationName: string, options?: SpanOptions): Span {
    const reference = this.resolveReference(options);
    const kind = options?.kind
      ?? (options?.rpcServer ? SpanKind.SERVER : SpanKind.INTERNAL);

    const context = reference
      ? this.childContext(reference.context, operationName)
      : this.rootContext(operationName);

    return new SpanImpl(
      {
        operationName,
        serviceName: this.serviceName,
        context,
        kind,
        reference,
        startTime: options?.startTime,
        tags: { ...this.tags, ...options?.tags },
      },
      {
        onFinish: (span) => this.report(span),
        onError: (error) => this.handleError(error),
      }
    );
  }

  /**
   * Extract the caller's context from a carrier.
   *
   * A failure is not fatal: start a root span instead. Missing context
   * is logged at debug, malformed context at warn.
   */
  extract(carrier: Carrier | HeaderRecord): ExtractResult {
    try {
      return { ok: true, context: this.propagator.extract(carrier) };
    } catch (error) {
      if (error instanceof NoContextFoundError) {
        this.logger.debug('No trace context in carrier', error.details);
        return { ok: false, error };
      }
      if (error instanceof MalformedContextError) {
        this.logger.warn('Malformed trace context in carrier', error.toJSON());
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Inject a context into a carrier for an outgoing call
   */
  inject(context: SpanContext, carrier: Carrier | HeaderRecord): void {
    this.propagator.inject(context, carrier);
  }

  /**
   * Continue the caller's trace as a SERVER span, or start a new trace
   * when the carrier holds no usable context.
   */
  startSpanFromCarrier(
    operationName: string,
    carrier: Carrier | HeaderRecord,
    options?: Omit<SpanOptions, 'childOf' | 'followsFrom' | 'rpcServer'>
  ): Span {
    const extracted = this.extract(carrier);
    if (extracted.ok) {
      return this.startSpan(operationName, { ...options, rpcServer: extracted.context });
    }
    return this.startSpan(operationName, {
      ...options,
      kind: options?.kind ?? SpanKind.SERVER,
    });
  }

  /**
   * Deliver queued spans
   */
  flush(): Promise<void> {
    return this.reporter.flush();
  }

  /**
   * Flush and close the reporter
   */
  close(): Promise<void> {
    return this.reporter.close();
  }

  private resolveReference(options?: SpanOptions): SpanReference | undefined {
    if (options?.rpcServer) {
      return { type: 'child_of', context: options.rpcServer };
    }
    if (options?.childOf) {
      return { type: 'child_of', context: options.childOf };
    }
    if (options?.followsFrom) {
      return { type: 'follows_from', context: options.followsFrom };
    }
    return undefined;
  }

  private rootContext(operationName: string): SpanContext {
    const traceId = generateTraceId({ use128Bit: this.traceId128Bit });
    return new SpanContext({
      traceId,
      spanId: generateSpanId(),
      sampling: this.sampler.decide(traceId, operationName),
    });
  }

  private childContext(parent: SpanContext, operationName: string): SpanContext {
    let spanId = generateSpanId();
    while (spanId === parent.spanId) {
      spanId = generateSpanId();
    }

    const sampling = parent.sampling === SamplingDecision.DEFERRED
      ? this.resolveDeferred(parent, operationName)
      : parent.sampling;

    return new SpanContext({
      traceId: parent.traceId,
      spanId,
      parentSpanId: parent.spanId,
      sampling,
      debug: parent.debug,
      baggage: parent.baggage,
    });
  }

  /**
   * A caller that did not decide leaves the decision to us. It is taken
   * once per parent context and reused for every child of it.
   */
  private resolveDeferred(parent: SpanContext, operationName: string): RootSamplingDecision {
    let decision = this.resolved.get(parent);
    if (decision === undefined) {
      decision = this.sampler.decide(parent.traceId, operationName);
      this.resolved.set(parent, decision);
    }
    return decision;
  }

  private report(span: FinishedSpan): void {
    if (!span.context.isSampled) {
      return;
    }

    try {
      this.reporter.report(span);
    } catch (error) {
      this.handleError(new ReporterUnavailableError('reporter threw', {
        details: { spanId: span.context.spanId },
        cause: toError(error),
      }));
    }
  }

  private handleError(error: TracingError): void {
    try {
      this.errorHandler(error);
    } catch (handlerError) {
      this.logger.error('Tracing error handler threw', {
        error: toError(handlerError).message,
      });
    }
  }
}
