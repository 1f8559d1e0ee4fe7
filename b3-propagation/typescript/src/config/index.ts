/**
 * Configuration module exports
 */

export {
  tracingConfigSchema,
  samplerConfigSchema,
  reporterConfigSchema,
} from './schema';
export type { TracingConfig, SamplerConfig, ReporterConfig } from './schema';
export { DEFAULT_CONFIG } from './defaults';
export { configFromEnvironment } from './env';
export { loadConfig, validateConfig } from './loader';
export type { ConfigOverrides } from './loader';
