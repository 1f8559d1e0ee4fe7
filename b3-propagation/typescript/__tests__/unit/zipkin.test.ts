import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { ReporterUnavailableError } from '../../src/errors';
import {
  TEST_SPAN_ID,
  TEST_TRACE_ID,
  createSpanContextFixture,
  createTestTracer,
} from '../../src/testing';
import { SpanKind } from '../../src/types';
import type { FinishedSpan } from '../../src/types';
import { ZipkinHttpSender, formatAnnotation, toZipkinSpan } from '../../src/zipkin';
import { finishedSpan } from './helpers';

const START = 1_700_000_000_000;

function clientSpan(): FinishedSpan {
  const { tracer } = createTestTracer();
  const span = tracer
    .startSpan('GET /Users', {
      childOf: createSpanContextFixture(),
      kind: SpanKind.CLIENT,
      startTime: START,
      tags: { 'http.method': 'GET', 'http.status_code': 200 },
    })
    .logFields({ event: 'retry' }, START + 10)
    .logFields({ event: 'cache', hit: false }, START + 20);
  return finishedSpan(span, START + 250);
}

describe('toZipkinSpan', () => {
  it('converts a finished span to the v2 model', () => {
    const span = clientSpan();

    expect(toZipkinSpan(span)).toEqual({
      traceId: TEST_TRACE_ID,
      id: span.context.spanId,
      parentId: TEST_SPAN_ID,
      name: 'get /users',
      kind: 'CLIENT',
      timestamp: 1_700_000_000_000_000,
      duration: 250_000,
      localEndpoint: { serviceName: 'test-service' },
      annotations: [
        { timestamp: 1_700_000_000_010_000, value: 'retry' },
        { timestamp: 1_700_000_000_020_000, value: 'event=cache hit=false' },
      ],
      tags: { 'http.method': 'GET', 'http.status_code': '200' },
    });
  });

  it('omits kind, parent and empty collections on an internal root span', () => {
    const { tracer } = createTestTracer();
    const span = finishedSpan(tracer.startSpan('work', { startTime: START }), START + 3);

    expect(toZipkinSpan(span)).toEqual({
      traceId: span.context.traceId,
      id: span.context.spanId,
      name: 'work',
      timestamp: 1_700_000_000_000_000,
      duration: 3000,
      localEndpoint: { serviceName: 'test-service' },
    });
  });

  it('never emits a zero duration', () => {
    const { tracer } = createTestTracer();
    const span = finishedSpan(tracer.startSpan('work', { startTime: START }), START);

    expect(toZipkinSpan(span).duration).toBe(1);
  });

  it('marks debug spans', () => {
    const { tracer } = createTestTracer();
    const span = finishedSpan(
      tracer.startSpan('work', { childOf: createSpanContextFixture({ debug: true }) })
    );

    expect(toZipkinSpan(span).debug).toBe(true);
  });

  it('uses an explicit local endpoint', () => {
    const endpoint = { serviceName: 'edge', ipv4: '10.0.0.7', port: 8080 };

    expect(toZipkinSpan(clientSpan(), endpoint).localEndpoint).toEqual(endpoint);
  });
});

describe('formatAnnotation', () => {
  it('uses the bare event name when it is the only field', () => {
    expect(formatAnnotation({ event: 'cache_miss' })).toBe('cache_miss');
  });

  it('joins key=value pairs otherwise', () => {
    expect(formatAnnotation({ rows: 12, cached: true })).toBe('rows=12 cached=true');
  });
});

describe('ZipkinHttpSender', () => {
  const origin = 'http://zipkin.test:9411';
  const endpoint = `${origin}/api/v2/spans`;
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('POSTs the batch as a JSON array', async () => {
    let body = '';
    agent
      .get(origin)
      .intercept({
        path: '/api/v2/spans',
        method: 'POST',
        headers: { 'content-type': 'application/json', 'x-api-key': 'test-secret' },
        body: (received: string) => {
          body = received;
          return true;
        },
      })
      .reply(202, '');
    const sender = new ZipkinHttpSender({
      endpoint,
      headers: { 'x-api-key': 'test-secret' },
      dispatcher: agent,
    });
    const span = clientSpan();

    await sender.send([span]);

    expect(JSON.parse(body)).toEqual([toZipkinSpan(span)]);
    agent.assertNoPendingInterceptors();
  });

  it('sends nothing for an empty batch', async () => {
    const sender = new ZipkinHttpSender({ endpoint, dispatcher: agent });

    await expect(sender.send([])).resolves.toBeUndefined();
  });

  it('fails with ReporterUnavailable on a non-2xx status', async () => {
    agent.get(origin).intercept({ path: '/api/v2/spans', method: 'POST' }).reply(503, 'overloaded');
    const sender = new ZipkinHttpSender({ endpoint, dispatcher: agent });

    const error = await sender.send([clientSpan()]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ReporterUnavailableError);
    expect(error).toMatchObject({
      message: 'Reporter unavailable: HTTP 503',
      details: { statusCode: 503, endpoint },
    });
  });

  it('fails with ReporterUnavailable when the request fails', async () => {
    agent
      .get(origin)
      .intercept({ path: '/api/v2/spans', method: 'POST' })
      .replyWithError(new Error('connect ECONNREFUSED'));
    const sender = new ZipkinHttpSender({ endpoint, dispatcher: agent });

    const error = await sender.send([clientSpan()]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ReporterUnavailableError);
    expect(error).toMatchObject({
      message: 'Reporter unavailable: request to Zipkin failed',
      details: { endpoint, spans: 1 },
    });
  });

  it('defaults to the local Zipkin endpoint', () => {
    expect(new ZipkinHttpSender().endpoint).toBe('http://localhost:9411/api/v2/spans');
  });
});
