/**
 * Zipkin v2 JSON span model and conversion from finished spans.
 */

import { SpanKind } from '../types';
import type { FinishedSpan, LogFields } from '../types';

export type ZipkinKind = 'CLIENT' | 'SERVER' | 'PRODUCER' | 'CONSUMER';

export interface ZipkinEndpoint {
  serviceName?: string;
  ipv4?: string;
  ipv6?: string;
  port?: number;
}

export interface ZipkinAnnotation {
  /** Microseconds since epoch */
  timestamp: number;
  value: string;
}

export interface ZipkinSpan {
  traceId: string;
  id: string;
  parentId?: string;
  name: string;
  kind?: ZipkinKind;
  /** Microseconds since epoch */
  timestamp: number;
  /** Microseconds */
  duration: number;
  localEndpoint: ZipkinEndpoint;
  annotations?: ZipkinAnnotation[];
  tags?: Record<string, string>;
  debug?: boolean;
}

const KIND_MAP: Record<SpanKind, ZipkinKind | undefined> = {
  [SpanKind.CLIENT]: 'CLIENT',
  [SpanKind.SERVER]: 'SERVER',
  [SpanKind.PRODUCER]: 'PRODUCER',
  [SpanKind.CONSUMER]: 'CONSUMER',
  [SpanKind.INTERNAL]: undefined,
};

/**
 * Annotation text for a log entry: the bare event name when that is all
 * there is, otherwise space-separated key=value pairs.
 */
export function formatAnnotation(fields: Readonly<LogFields>): string {
  const entries = Object.entries(fields);
  if (entries.length === 1 && entries[0][0] === 'event') {
    return String(entries[0][1]);
  }
  return entries.map(([key, value]) => `${key}=${String(value)}`).join(' ');
}

/**
 * Convert a finished span to the Zipkin v2 model
 *
 * @param localEndpoint - Overrides the endpoint derived from the span's service name
 */
export function toZipkinSpan(span: FinishedSpan, localEndpoint?: ZipkinEndpoint): ZipkinSpan {
  const context = span.context;
  const zipkinSpan: ZipkinSpan = {
    traceId: context.traceId,
    id: context.spanId,
    name: span.operationName.toLowerCase(),
    timestamp: Math.round(span.startTime * 1000),
    // Zipkin treats a zero duration as unset
    duration: Math.max(1, Math.round(span.duration * 1000)),
    localEndpoint: localEndpoint ?? { serviceName: span.serviceName },
  };

  if (context.parentSpanId) {
    zipkinSpan.parentId = context.parentSpanId;
  }

  const kind = KIND_MAP[span.kind];
  if (kind) {
    zipkinSpan.kind = kind;
  }

  const tagEntries = Object.entries(span.tags);
  if (tagEntries.length > 0) {
    zipkinSpan.tags = Object.fromEntries(
      tagEntries.map(([key, value]) => [key, String(value)])
    );
  }

  if (span.logs.length > 0) {
    zipkinSpan.annotations = span.logs.map((log) => ({
      timestamp: Math.round(log.timestamp * 1000),
      value: formatAnnotation(log.fields),
    }));
  }

  if (context.debug) {
    zipkinSpan.debug = true;
  }

  return zipkinSpan;
}
