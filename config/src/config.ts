/**
 * @flatframe/config - Configuration Factory Functions
 *
 * @packageDocumentation
 */

import type { LogLevel } from '@flatframe/core';
import type {
  DeepPartial,
  EnvConfigOptions,
  FlatframeConfig,
  FlattenConfig,
  LogFormat,
  ObservabilityConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/** The override when one is given, else the fallback */
function pick<T>(override: T | undefined, fallback: T): T {
  return override === undefined ? fallback : override;
}

function mergeFlatten(
  base: DeepPartial<FlattenConfig> | undefined,
  override: DeepPartial<FlattenConfig> | undefined
): DeepPartial<FlattenConfig> {
  return {
    defaultDelimiter: override?.defaultDelimiter ?? base?.defaultDelimiter,
    maxParallelism: override?.maxParallelism ?? base?.maxParallelism,
  };
}

function mergeObservability(
  base: DeepPartial<ObservabilityConfig> | undefined,
  override: DeepPartial<ObservabilityConfig> | undefined
): DeepPartial<ObservabilityConfig> {
  return {
    logLevel: override?.logLevel ?? base?.logLevel,
    logFormat: override?.logFormat ?? base?.logFormat,
  };
}

/**
 * Create a complete FlatframeConfig with optional overrides.
 *
 * Undefined override values never replace a base value. The result is
 * frozen.
 *
 * @param overrides - Partial configuration to merge with `base`
 * @param base - Base configuration (defaults to DEFAULT_CONFIG)
 *
 * @example
 * ```typescript
 * const config = createConfig();
 * const tuned = createConfig({ flatten: { maxParallelism: 16 } });
 * const derived = createConfig({ observability: { logFormat: 'pretty' } }, tuned);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<FlatframeConfig>,
  base: FlatframeConfig = DEFAULT_CONFIG
): FlatframeConfig {
  const flatten = overrides?.flatten;
  const observability = overrides?.observability;

  return Object.freeze({
    flatten: Object.freeze({
      defaultDelimiter: pick(flatten?.defaultDelimiter, base.flatten.defaultDelimiter),
      maxParallelism: pick(flatten?.maxParallelism, base.flatten.maxParallelism),
    }),
    observability: Object.freeze({
      logLevel: pick(observability?.logLevel, base.observability.logLevel),
      logFormat: pick(observability?.logFormat, base.observability.logFormat),
    }),
  });
}

/**
 * Merge multiple partial configurations. Later configurations take
 * precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { flatten: { maxParallelism: 4 } },
 *   { flatten: { maxParallelism: 8, defaultDelimiter: '|' } },
 * );
 * // merged.flatten.maxParallelism === 8
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<FlatframeConfig> | null | undefined>
): DeepPartial<FlatframeConfig> {
  let result: DeepPartial<FlatframeConfig> = {};

  for (const config of configs) {
    if (config) {
      result = {
        flatten: mergeFlatten(result.flatten, config.flatten),
        observability: mergeObservability(result.observability, config.observability),
      };
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isInteger(num) ? num : undefined;
}

/**
 * Get environment variable with prefix, e.g. FLATFRAME_FLATTEN_MAX_PARALLELISM.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Create configuration from environment variables.
 *
 * Variables follow the pattern <PREFIX>_<SECTION>_<FIELD>:
 * - FLATFRAME_FLATTEN_DEFAULT_DELIMITER=|
 * - FLATFRAME_FLATTEN_MAX_PARALLELISM=8
 * - FLATFRAME_OBSERVABILITY_LOG_LEVEL=debug
 * - FLATFRAME_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * An empty delimiter, a count that is not an integer and unknown level or
 * format names are ignored.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_FLATTEN_MAX_PARALLELISM: '2' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): FlatframeConfig {
  const prefix = options.prefix ?? 'FLATFRAME';
  const env = options.env ?? process.env;

  const delimiter = getEnvVar(env, prefix, 'FLATTEN', 'DEFAULT', 'DELIMITER');
  const defaultDelimiter = delimiter === '' ? undefined : delimiter;
  const maxParallelism = parseInteger(getEnvVar(env, prefix, 'FLATTEN', 'MAX', 'PARALLELISM'));
  const logLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL')?.toLowerCase();
  const logFormat = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')?.toLowerCase();

  return createConfig({
    flatten: {
      defaultDelimiter,
      maxParallelism,
    },
    observability: {
      logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
      logFormat: logFormat !== undefined && isLogFormat(logFormat) ? logFormat : undefined,
    },
  });
}
