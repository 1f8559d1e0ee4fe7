/**
 * Tracing configuration schema
 */

import { z } from 'zod';

/**
 * Service name: lowercase alphanumerics, dots, underscores and hyphens
 */
const SERVICE_NAME_REGEX = /^[a-z0-9._-]+$/;

const positiveInt = z.number().int().positive();

export const samplerConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('const'), param: z.union([z.literal(0), z.literal(1)]) }),
  z.object({ type: z.literal('probabilistic'), param: z.number().min(0).max(1) }),
  z.object({ type: z.literal('ratelimiting'), param: z.number().min(0) }),
]);

export const reporterConfigSchema = z.object({
  type: z.enum(['zipkin', 'logging', 'noop']),
  endpoint: z.string().url(),
  maxQueueSize: positiveInt,
  maxBatchSize: positiveInt,
  flushIntervalMs: z.number().int().min(0),
  timeoutMs: positiveInt,
  overflowPolicy: z.enum(['drop-newest', 'drop-oldest']),
  circuitBreaker: z.object({
    failureThreshold: positiveInt,
    resetTimeoutMs: positiveInt,
  }),
});

export const tracingConfigSchema = z.object({
  serviceName: z
    .string()
    .min(1, 'Service name is required')
    .regex(
      SERVICE_NAME_REGEX,
      'must contain only lowercase letters, numbers, dots, underscores, and hyphens'
    ),
  traceId128Bit: z.boolean(),
  propagation: z.object({
    format: z.enum(['multi', 'single', 'both']),
  }),
  baggage: z.object({
    maxItems: z.number().int().min(0),
    maxValueLength: z.number().int().min(0),
    maxTotalLength: z.number().int().min(0),
  }),
  sampler: samplerConfigSchema,
  reporter: reporterConfigSchema,
  tags: z.record(z.union([z.string(), z.number(), z.boolean()])),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

export type SamplerConfig = z.infer<typeof samplerConfigSchema>;
export type ReporterConfig = z.infer<typeof reporterConfigSchema>;
export type TracingConfig = z.infer<typeof tracingConfigSchema>;
