/**
 * Span implementation.
 *
 * Records tags and logs in place until finish(), then freezes a snapshot
 * and hands it to the tracer.
 */

import type { SpanContext } from '../context';
import { DoubleFinishError, PostFinishMutationError } from '../errors';
import type {
  FinishedSpan,
  LogFields,
  SpanKind,
  SpanLog,
  SpanReference,
  Tags,
  TagValue,
} from '../types';
import type { FinishResult, Span, SpanHooks } from './interface';

export interface SpanInit {
  operationName: string;
  serviceName: string;
  context: SpanContext;
  kind: SpanKind;
  reference?: SpanReference;
  startTime?: number;
  tags?: Tags;
}

export class SpanImpl implements Span {
  private readonly spanContext: SpanContext;
  private readonly hooks: SpanHooks;
  private readonly serviceName: string;
  private readonly spanTags: Tags;
  private readonly spanLogs: SpanLog[] = [];
  private name: string;
  private finishedAt?: number;

  readonly kind: SpanKind;
  readonly reference?: SpanReference;
  readonly startTime: number;

  constructor(init: SpanInit, hooks: SpanHooks) {
    this.spanContext = init.context;
    this.hooks = hooks;
    this.serviceName = init.serviceName;
    this.name = init.operationName;
    this.kind = init.kind;
    this.reference = init.reference;
    this.startTime = init.startTime ?? Date.now();
    this.spanTags = { ...init.tags };
  }

  get traceId(): string {
    return this.spanContext.traceId;
  }

  get spanId(): string {
    return this.spanContext.spanId;
  }

  get parentSpanId(): string | undefined {
    return this.spanContext.parentSpanId;
  }

  get operationName(): string {
    return this.name;
  }

  get finishTime(): number | undefined {
    return this.finishedAt;
  }

  get duration(): number | undefined {
    return this.finishedAt === undefined ? undefined : this.finishedAt - this.startTime;
  }

  get tags(): Readonly<Tags> {
    return Object.freeze({ ...this.spanTags });
  }

  get logs(): ReadonlyArray<SpanLog> {
    return Object.freeze([...this.spanLogs]);
  }

  get isFinished(): boolean {
    return this.finishedAt !== undefined;
  }

  setTag(key: string, value: TagValue): Span {
    if (this.rejectIfFinished('set tag')) {
      return this;
    }
    this.spanTags[key] = value;
    return this;
  }

  addTags(tags: Tags): Span {
    if (this.rejectIfFinished('add tags')) {
      return this;
    }
    Object.assign(this.spanTags, tags);
    return this;
  }

  logFields(fields: LogFields, timestamp?: number): Span {
    if (this.rejectIfFinished('log fields')) {
      return this;
    }
    this.spanLogs.push({
      timestamp: timestamp ?? Date.now(),
      fields: Object.freeze({ ...fields }),
    });
    return this;
  }

  setError(error: Error | string): Span {
    if (this.rejectIfFinished('set error')) {
      return this;
    }

    this.spanTags['error'] = true;

    if (typeof error === 'string') {
      this.logFields({ event: 'error', message: error });
    } else {
      const fields: LogFields = {
        event: 'error',
        'error.kind': error.name || 'Error',
        message: error.message,
      };
      if (error.stack) {
        fields['stack'] = error.stack;
      }
      this.logFields(fields);
    }

    return this;
  }

  setOperationName(name: string): Span {
    if (this.rejectIfFinished('rename span')) {
      return this;
    }
    this.name = name;
    return this;
  }

  finish(finishTime?: number): FinishResult {
    if (this.finishedAt !== undefined) {
      const error = new DoubleFinishError(this.name, this.spanId);
      this.hooks.onError(error);
      return { ok: false, error };
    }

    // A clock step backwards must not produce a negative duration
    const finishedAt = Math.max(finishTime ?? Date.now(), this.startTime);
    this.finishedAt = finishedAt;

    const snapshot: FinishedSpan = Object.freeze({
      operationName: this.name,
      serviceName: this.serviceName,
      context: this.spanContext,
      kind: this.kind,
      reference: this.reference ? Object.freeze({ ...this.reference }) : undefined,
      startTime: this.startTime,
      finishTime: finishedAt,
      duration: finishedAt - this.startTime,
      tags: this.tags,
      logs: this.logs,
    });

    this.hooks.onFinish(snapshot);
    return { ok: true, span: snapshot };
  }

  context(): SpanContext {
    return this.spanContext;
  }

  private rejectIfFinished(operation: string): boolean {
    if (this.finishedAt === undefined) {
      return false;
    }
    this.hooks.onError(new PostFinishMutationError(this.name, this.spanId, operation));
    return true;
  }
}
