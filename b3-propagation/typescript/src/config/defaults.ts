/**
 * Default configuration values
 */

import { DEFAULT_BAGGAGE_LIMITS } from '../propagation';
import { DEFAULT_ZIPKIN_ENDPOINT } from '../zipkin';
import type { TracingConfig } from './schema';

export const DEFAULT_CONFIG: Omit<TracingConfig, 'serviceName'> = {
  traceId128Bit: false,
  propagation: { format: 'multi' },
  baggage: { ...DEFAULT_BAGGAGE_LIMITS },
  sampler: { type: 'const', param: 1 },
  reporter: {
    type: 'zipkin',
    endpoint: DEFAULT_ZIPKIN_ENDPOINT,
    maxQueueSize: 1000,
    maxBatchSize: 100,
    flushIntervalMs: 1000,
    timeoutMs: 5000,
    overflowPolicy: 'drop-newest',
    circuitBreaker: {
      failureThreshold: 5,
      resetTimeoutMs: 30000,
    },
  },
  tags: {},
  logLevel: 'info',
};
