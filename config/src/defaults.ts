/**
 * @flatframe/config - Default Configuration Values
 *
 * Values are sourced from @flatframe/core constants where applicable.
 *
 * @packageDocumentation
 */

import { DEFAULT_DELIMITER, DEFAULT_MAX_PARALLELISM } from '@flatframe/core';

import type { FlatframeConfig } from './types.js';

const DEFAULT_FLATTEN_CONFIG = {
  defaultDelimiter: DEFAULT_DELIMITER,
  maxParallelism: DEFAULT_MAX_PARALLELISM,
} as const;

const DEFAULT_OBSERVABILITY_CONFIG = {
  logLevel: 'info',
  logFormat: 'json',
} as const;

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: FlatframeConfig = Object.freeze({
  flatten: Object.freeze({ ...DEFAULT_FLATTEN_CONFIG }),
  observability: Object.freeze({ ...DEFAULT_OBSERVABILITY_CONFIG }),
});
