/**
 * @flatframe/config - Unified Configuration for flatframe
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@flatframe/config';
 *
 * const config = createConfig({ flatten: { maxParallelism: 8 } });
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @flatframe/config
 */

export type {
  DeepPartial,
  FlattenConfig,
  LogFormat,
  ObservabilityConfig,
  FlatframeConfig,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

export { validateConfig } from './validation.js';
