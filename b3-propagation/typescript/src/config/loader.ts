/**
 * Configuration loading: defaults < environment < explicit overrides,
 * validated as a whole.
 */

import { ConfigurationError } from '../errors';
import { DEFAULT_CONFIG } from './defaults';
import { configFromEnvironment } from './env';
import { tracingConfigSchema } from './schema';
import type { TracingConfig } from './schema';

/**
 * Partial, unvalidated configuration. Values from the environment arrive
 * as plain strings, so this is looser than TracingConfig.
 */
export type ConfigOverrides = {
  serviceName?: string;
  traceId128Bit?: boolean;
  propagation?: { format?: string };
  baggage?: { maxItems?: number; maxValueLength?: number; maxTotalLength?: number };
  /** Replaced as a whole, never merged field by field */
  sampler?: { type?: string; param?: number };
  reporter?: Record<string, unknown>;
  tags?: Record<string, string | number | boolean>;
  logLevel?: string;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(base: object, override: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] = key !== 'sampler' && isPlainObject(existing) && isPlainObject(value)
      ? merge(existing, value)
      : value;
  }

  return result;
}

/**
 * Validate a complete configuration object
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateConfig(config: unknown): TracingConfig {
  const result = tracingConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid tracing configuration: ${issues.join('; ')}`, {
      details: { issues },
    });
  }
  return result.data;
}

/**
 * Load configuration from defaults, the environment and overrides
 *
 * @param overrides - Explicit values; win over the environment
 * @param env - Environment to read TRACING_* variables from
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = process.env
): TracingConfig {
  const merged = merge(merge(DEFAULT_CONFIG, configFromEnvironment(env)), overrides);
  return validateConfig(merged);
}
