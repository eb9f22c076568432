/**
 * @flatframe/config - Configuration Validation
 *
 * @packageDocumentation
 */

import { MAX_RECOMMENDED_PARALLELISM } from '@flatframe/core';
import type {
  FlatframeConfig,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types.js';

/**
 * Validate a complete FlatframeConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   logger.error('Invalid configuration', undefined, { issues: result.errors.map(e => e.path) });
 * }
 * ```
 */
export function validateConfig(config: FlatframeConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateFlattenConfig(config.flatten, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateFlattenConfig(
  flatten: FlatframeConfig['flatten'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (flatten.defaultDelimiter.length === 0) {
    errors.push({
      path: 'flatten.defaultDelimiter',
      message: 'Default delimiter must not be empty',
      value: flatten.defaultDelimiter,
      suggestion: "Use ',' or another non-empty string",
    });
  }

  if (!Number.isInteger(flatten.maxParallelism) || flatten.maxParallelism <= 0) {
    errors.push({
      path: 'flatten.maxParallelism',
      message: 'Max parallelism must be a positive integer',
      value: flatten.maxParallelism,
    });
  } else if (flatten.maxParallelism > MAX_RECOMMENDED_PARALLELISM) {
    warnings.push({
      path: 'flatten.maxParallelism',
      message: `Max parallelism exceeds ${MAX_RECOMMENDED_PARALLELISM}`,
      value: flatten.maxParallelism,
      recommendation: 'Partitions share one event loop; higher values only add scheduling overhead',
    });
  }
}
