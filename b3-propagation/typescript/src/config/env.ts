/**
 * Environment variable configuration
 */

import type { ConfigOverrides } from './loader';

type Env = Record<string, string | undefined>;

/**
 * Parse tags from "key1:value1,key2:value2"
 */
function parseTags(tagsString: string): Record<string, string> {
  const tags: Record<string, string> = {};

  for (const pair of tagsString.split(',')) {
    const trimmedPair = pair.trim();
    const colonIndex = trimmedPair.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const key = trimmedPair.substring(0, colonIndex).trim();
    const value = trimmedPair.substring(colonIndex + 1).trim();
    if (key && value) {
      tags[key] = value;
    }
  }

  return tags;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {
    return true;
  }
  if (lower === 'false' || lower === '0' || lower === 'no') {
    return false;
  }

  return undefined;
}

/**
 * Read configuration overrides from environment variables:
 * - TRACING_SERVICE_NAME - Service name
 * - TRACING_TRACE_ID_128BIT - Generate 128-bit trace IDs
 * - TRACING_B3_FORMAT - multi, single or both
 * - TRACING_BAGGAGE_MAX_ITEMS / TRACING_BAGGAGE_MAX_VALUE_LENGTH / TRACING_BAGGAGE_MAX_TOTAL_LENGTH
 * - TRACING_SAMPLER_TYPE / TRACING_SAMPLER_PARAM - Sampler type and parameter
 * - TRACING_REPORTER_TYPE - zipkin, logging or noop
 * - TRACING_ZIPKIN_ENDPOINT - Zipkin v2 spans endpoint
 * - TRACING_REPORTER_QUEUE_SIZE / TRACING_REPORTER_BATCH_SIZE / TRACING_REPORTER_FLUSH_INTERVAL_MS
 * - TRACING_REPORTER_OVERFLOW_POLICY - drop-newest or drop-oldest
 * - TRACING_TAGS - Tags as comma-separated key:value pairs
 * - TRACING_LOG_LEVEL - Tracer log level
 *
 * Values are passed through unchecked; loadConfig validates them.
 */
export function configFromEnvironment(env: Env = process.env): ConfigOverrides {
  const config: ConfigOverrides = {};

  if (env.TRACING_SERVICE_NAME) {
    config.serviceName = env.TRACING_SERVICE_NAME;
  }

  const traceId128Bit = parseBoolean(env.TRACING_TRACE_ID_128BIT);
  if (traceId128Bit !== undefined) {
    config.traceId128Bit = traceId128Bit;
  }

  if (env.TRACING_B3_FORMAT) {
    config.propagation = { format: env.TRACING_B3_FORMAT };
  }

  const baggage: Record<string, number> = {};
  const maxItems = parseNumber(env.TRACING_BAGGAGE_MAX_ITEMS);
  if (maxItems !== undefined) baggage.maxItems = maxItems;
  const maxValueLength = parseNumber(env.TRACING_BAGGAGE_MAX_VALUE_LENGTH);
  if (maxValueLength !== undefined) baggage.maxValueLength = maxValueLength;
  const maxTotalLength = parseNumber(env.TRACING_BAGGAGE_MAX_TOTAL_LENGTH);
  if (maxTotalLength !== undefined) baggage.maxTotalLength = maxTotalLength;
  if (Object.keys(baggage).length > 0) {
    config.baggage = baggage;
  }

  if (env.TRACING_SAMPLER_TYPE) {
    config.sampler = {
      type: env.TRACING_SAMPLER_TYPE,
      param: parseNumber(env.TRACING_SAMPLER_PARAM),
    };
  }

  const reporter: Record<string, unknown> = {};
  if (env.TRACING_REPORTER_TYPE) reporter.type = env.TRACING_REPORTER_TYPE;
  if (env.TRACING_ZIPKIN_ENDPOINT) reporter.endpoint = env.TRACING_ZIPKIN_ENDPOINT;
  const queueSize = parseNumber(env.TRACING_REPORTER_QUEUE_SIZE);
  if (queueSize !== undefined) reporter.maxQueueSize = queueSize;
  const batchSize = parseNumber(env.TRACING_REPORTER_BATCH_SIZE);
  if (batchSize !== undefined) reporter.maxBatchSize = batchSize;
  const flushInterval = parseNumber(env.TRACING_REPORTER_FLUSH_INTERVAL_MS);
  if (flushInterval !== undefined) reporter.flushIntervalMs = flushInterval;
  if (env.TRACING_REPORTER_OVERFLOW_POLICY) {
    reporter.overflowPolicy = env.TRACING_REPORTER_OVERFLOW_POLICY;
  }
  if (Object.keys(reporter).length > 0) {
    config.reporter = reporter;
  }

  if (env.TRACING_TAGS) {
    config.tags = parseTags(env.TRACING_TAGS);
  }

  if (env.TRACING_LOG_LEVEL) {
    config.logLevel = env.TRACING_LOG_LEVEL;
  }

  return config;
}
