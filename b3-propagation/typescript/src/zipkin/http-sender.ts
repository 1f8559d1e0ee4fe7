/**
 * ZipkinHttpSender - POSTs span batches to a Zipkin v2 HTTP endpoint.
 */

import { request } from 'undici';
import type { Dispatcher } from 'undici';
import { ReporterUnavailableError, toError } from '../errors';
import type { SpanSender } from '../reporter';
import type { FinishedSpan } from '../types';
import { toZipkinSpan } from './model';
import type { ZipkinEndpoint } from './model';

export const DEFAULT_ZIPKIN_ENDPOINT = 'http://localhost:9411/api/v2/spans';

export interface ZipkinHttpSenderOptions {
  /**
   * @default 'http://localhost:9411/api/v2/spans'
   */
  endpoint?: string;

  /**
   * Header and body timeout in ms
   * @default 5000
   */
  timeoutMs?: number;

  /** Extra request headers */
  headers?: Record<string, string>;

  /** Overrides the endpoint derived from each span's service name */
  localEndpoint?: ZipkinEndpoint;

  /** undici dispatcher (connection pool, proxy or mock agent) */
  dispatcher?: Dispatcher;
}

export class ZipkinHttpSender implements SpanSender {
  readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly localEndpoint?: ZipkinEndpoint;
  private readonly dispatcher?: Dispatcher;

  constructor(options?: ZipkinHttpSenderOptions) {
    this.endpoint = options?.endpoint ?? DEFAULT_ZIPKIN_ENDPOINT;
    this.timeoutMs = options?.timeoutMs ?? 5000;
    this.headers = options?.headers ?? {};
    this.localEndpoint = options?.localEndpoint;
    this.dispatcher = options?.dispatcher;
  }

  async send(spans: ReadonlyArray<FinishedSpan>): Promise<void> {
    if (spans.length === 0) {
      return;
    }

    const body = JSON.stringify(spans.map((span) => toZipkinSpan(span, this.localEndpoint)));

    let statusCode: number;
    try {
      const response = await request(this.endpoint, {
        method: 'POST',
        headers: {
          ...this.headers,
          'content-type': 'application/json',
        },
        body,
        bodyTimeout: this.timeoutMs,
        headersTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });

      // Consume the response body to free resources
      await response.body.text();
      statusCode = response.statusCode;
    } catch (error) {
      throw new ReporterUnavailableError('request to Zipkin failed', {
        details: { endpoint: this.endpoint, spans: spans.length },
        cause: toError(error),
      });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw ReporterUnavailableError.httpStatus(statusCode, this.endpoint);
    }
  }

  async close(): Promise<void> {}
}
