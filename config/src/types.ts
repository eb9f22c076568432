/**
 * @flatframe/config - Type Definitions
 *
 * Naming conventions:
 * - Counts: max*, *Size
 * - Durations: *Ms
 *
 * @packageDocumentation
 * @module @flatframe/config
 */

import type { LogLevel } from '@flatframe/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Flatten Configuration
// =============================================================================

/**
 * Settings for the flatten_columns command.
 *
 * @example
 * ```typescript
 * const flattenConfig: FlattenConfig = {
 *   defaultDelimiter: ',',
 *   maxParallelism: 4,
 * };
 * ```
 */
export interface FlattenConfig {
  /** Delimiter for text columns when the caller supplies none */
  defaultDelimiter: string;

  /** Partitions transformed concurrently */
  maxParallelism: number;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Console output format */
  logFormat: LogFormat;
}

// =============================================================================
// Main Configuration
// =============================================================================

/**
 * Complete flatframe configuration.
 *
 * @example
 * ```typescript
 * const config = createConfig({ flatten: { maxParallelism: 8 } });
 * ```
 */
export interface FlatframeConfig {
  flatten: FlattenConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  /** Path to the invalid field (e.g., 'flatten.maxParallelism') */
  path: string;

  message: string;

  /** The invalid value */
  value: unknown;

  suggestion?: string;
}

export interface ValidationWarning {
  path: string;

  message: string;

  value: unknown;

  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'FLATFRAME') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
