/**
 * @flatframe/config - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createConfig,
  validateConfig,
  getConfigFromEnv,
  mergeConfigs,
  DEFAULT_CONFIG,
  type FlatframeConfig,
} from '../index.js';

// =============================================================================
// Defaults
// =============================================================================

describe('DEFAULT_CONFIG', () => {
  it('should split on commas with four partitions in flight', () => {
    expect(DEFAULT_CONFIG.flatten).toEqual({ defaultDelimiter: ',', maxParallelism: 4 });
    expect(DEFAULT_CONFIG.observability).toEqual({ logLevel: 'info', logFormat: 'json' });
  });

  it('should be valid', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });
});

// =============================================================================
// createConfig / mergeConfigs
// =============================================================================

describe('createConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(createConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should apply partial overrides field by field', () => {
    const config = createConfig({ flatten: { maxParallelism: 16 } });

    expect(config.flatten).toEqual({ defaultDelimiter: ',', maxParallelism: 16 });
    expect(config.observability).toEqual(DEFAULT_CONFIG.observability);
  });

  it('should layer on a custom base', () => {
    const base = createConfig({ flatten: { defaultDelimiter: '|' } });
    const config = createConfig({ observability: { logFormat: 'pretty' } }, base);

    expect(config.flatten.defaultDelimiter).toBe('|');
    expect(config.observability.logFormat).toBe('pretty');
  });

  it('should freeze the result', () => {
    const config = createConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.flatten)).toBe(true);
  });
});

describe('mergeConfigs', () => {
  it('should let later configs win and skip empty entries', () => {
    const merged = mergeConfigs(
      { flatten: { maxParallelism: 4, defaultDelimiter: ';' } },
      null,
      { flatten: { maxParallelism: 8 } },
      undefined,
      { observability: { logLevel: 'debug' } }
    );

    expect(merged.flatten?.maxParallelism).toBe(8);
    expect(merged.flatten?.defaultDelimiter).toBe(';');
    expect(merged.observability?.logLevel).toBe('debug');
    expect(merged.observability?.logFormat).toBeUndefined();
  });

  it('should feed createConfig', () => {
    const config = createConfig(mergeConfigs({ flatten: { defaultDelimiter: '\t' } }));
    expect(config.flatten).toEqual({ defaultDelimiter: '\t', maxParallelism: 4 });
  });
});

// =============================================================================
// Environment
// =============================================================================

describe('getConfigFromEnv', () => {
  it('should read prefixed variables', () => {
    const config = getConfigFromEnv({
      env: {
        FLATFRAME_FLATTEN_DEFAULT_DELIMITER: '|',
        FLATFRAME_FLATTEN_MAX_PARALLELISM: '8',
        FLATFRAME_OBSERVABILITY_LOG_LEVEL: 'DEBUG',
        FLATFRAME_OBSERVABILITY_LOG_FORMAT: 'pretty',
      },
    });

    expect(config).toEqual({
      flatten: { defaultDelimiter: '|', maxParallelism: 8 },
      observability: { logLevel: 'debug', logFormat: 'pretty' },
    });
  });

  it('should honour a custom prefix', () => {
    const config = getConfigFromEnv({ prefix: 'myapp', env: { MYAPP_FLATTEN_MAX_PARALLELISM: '2' } });
    expect(config.flatten.maxParallelism).toBe(2);
  });

  it('should ignore values it cannot use', () => {
    const config = getConfigFromEnv({
      env: {
        FLATFRAME_FLATTEN_MAX_PARALLELISM: 'lots',
        FLATFRAME_OBSERVABILITY_LOG_LEVEL: 'verbose',
        FLATFRAME_OBSERVABILITY_LOG_FORMAT: ' ',
      },
    });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should ignore an empty delimiter and a fractional parallelism', () => {
    const config = getConfigFromEnv({
      env: {
        FLATFRAME_FLATTEN_DEFAULT_DELIMITER: '',
        FLATFRAME_FLATTEN_MAX_PARALLELISM: '2.5',
      },
    });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(validateConfig(config).valid).toBe(true);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe('validateConfig', () => {
  const withFlatten = (flatten: Partial<FlatframeConfig['flatten']>): FlatframeConfig =>
    createConfig({ flatten });

  it('should reject an empty default delimiter', () => {
    const result = validateConfig(withFlatten({ defaultDelimiter: '' }));

    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.path)).toEqual(['flatten.defaultDelimiter']);
  });

  it.each([0, -1, 1.5])('should reject maxParallelism %s', (maxParallelism) => {
    const result = validateConfig(withFlatten({ maxParallelism }));

    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.path)).toEqual(['flatten.maxParallelism']);
  });

  it('should warn above the recommended parallelism', () => {
    const result = validateConfig(withFlatten({ maxParallelism: 65 }));

    expect(result.valid).toBe(true);
    expect(result.warnings.map(w => w.path)).toEqual(['flatten.maxParallelism']);
  });
});
