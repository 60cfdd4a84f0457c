/**
 * @pooled/config - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, PoolCapacityError, ValidationError, pooled, pooledWithPool } from '@pooled/core';
import {
  createConfig,
  getConfigFromEnv,
  mergeConfigs,
  toColumnOptions,
  toLoggerConfig,
  validateConfig,
  DEFAULT_CONFIG,
  type PooledConfig,
} from '../index.js';

describe('@pooled/config', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should use 16-bit strict encoding and info-level JSON logs', () => {
      expect(DEFAULT_CONFIG).toEqual({
        encoding: { refWidth: 16, strictPool: true },
        observability: { logLevel: 'info', logFormat: 'json' },
      });
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
      expect(Object.isFrozen(DEFAULT_CONFIG.encoding)).toBe(true);
    });

    it('should pass validation', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });

  describe('createConfig', () => {
    it('should return the defaults without overrides', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should override individual fields', () => {
      const config = createConfig({ encoding: { refWidth: 32 } });

      expect(config.encoding).toEqual({ refWidth: 32, strictPool: true });
      expect(config.observability).toEqual(DEFAULT_CONFIG.observability);
    });

    it('should ignore undefined override fields', () => {
      const config = createConfig({ encoding: { refWidth: undefined, strictPool: false } });
      expect(config.encoding).toEqual({ refWidth: 16, strictPool: false });
    });

    it('should build on a base configuration', () => {
      const base = createConfig({ encoding: { refWidth: 8 } });
      const config = createConfig({ observability: { logLevel: 'debug' } }, base);

      expect(config.encoding.refWidth).toBe(8);
      expect(config.observability.logLevel).toBe('debug');
    });

    it('should deep freeze the result', () => {
      const config = createConfig();
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.observability)).toBe(true);
    });
  });

  describe('mergeConfigs', () => {
    it('should let later configurations win', () => {
      const merged = mergeConfigs(
        { encoding: { refWidth: 8 }, observability: { logFormat: 'pretty' } },
        null,
        { encoding: { refWidth: 32, strictPool: false } }
      );

      expect(merged.encoding?.refWidth).toBe(32);
      expect(merged.encoding?.strictPool).toBe(false);
      expect(merged.observability?.logFormat).toBe('pretty');
      expect(merged.observability?.logLevel).toBeUndefined();
    });

    it('should feed createConfig', () => {
      const config = createConfig(mergeConfigs({ encoding: { refWidth: 8 } }, { observability: { logLevel: 'warn' } }));
      expect(config).toEqual({
        encoding: { refWidth: 8, strictPool: true },
        observability: { logLevel: 'warn', logFormat: 'json' },
      });
    });
  });

  describe('getConfigFromEnv', () => {
    it('should read every variable', () => {
      const config = getConfigFromEnv({
        env: {
          POOLED_ENCODING_REF_WIDTH: '32',
          POOLED_ENCODING_STRICT_POOL: 'false',
          POOLED_OBSERVABILITY_LOG_LEVEL: 'DEBUG',
          POOLED_OBSERVABILITY_LOG_FORMAT: 'pretty',
        },
      });

      expect(config).toEqual({
        encoding: { refWidth: 32, strictPool: false },
        observability: { logLevel: 'debug', logFormat: 'pretty' },
      });
    });

    it('should fall back to defaults for unset variables', () => {
      expect(getConfigFromEnv({ env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should honour a custom prefix', () => {
      const config = getConfigFromEnv({
        prefix: 'etl',
        env: { ETL_ENCODING_REF_WIDTH: '8', POOLED_ENCODING_REF_WIDTH: '32' },
      });
      expect(config.encoding.refWidth).toBe(8);
    });

    it('should accept 1 and 0 as booleans', () => {
      expect(getConfigFromEnv({ env: { POOLED_ENCODING_STRICT_POOL: '0' } }).encoding.strictPool).toBe(false);
      expect(getConfigFromEnv({ env: { POOLED_ENCODING_STRICT_POOL: '1' } }).encoding.strictPool).toBe(true);
    });

    it('should reject an unsupported reference width', () => {
      try {
        getConfigFromEnv({ env: { POOLED_ENCODING_REF_WIDTH: '12' } });
        expect.unreachable('expected ValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
          expect(error.message).toBe('Invalid value for POOLED_ENCODING_REF_WIDTH: "12"');
          expect(error.suggestion).toBe('Set POOLED_ENCODING_REF_WIDTH to one of 8, 16, 32');
        }
      }
    });

    it('should reject unknown log levels and formats', () => {
      expect(() => getConfigFromEnv({ env: { POOLED_OBSERVABILITY_LOG_LEVEL: 'trace' } })).toThrow(ValidationError);
      expect(() => getConfigFromEnv({ env: { POOLED_OBSERVABILITY_LOG_FORMAT: 'xml' } })).toThrow(ValidationError);
      expect(() => getConfigFromEnv({ env: { POOLED_ENCODING_STRICT_POOL: 'yes' } })).toThrow(ValidationError);
    });
  });

  describe('validateConfig', () => {
    it('should warn about 8-bit references and a relaxed pool', () => {
      const result = validateConfig(createConfig({ encoding: { refWidth: 8, strictPool: false } }));

      expect(result.valid).toBe(true);
      expect(result.warnings.map(warning => warning.path)).toEqual(['encoding.refWidth', 'encoding.strictPool']);
      expect(result.warnings[0].message).toBe('8-bit references address at most 255 distinct values');
    });

    it('should report every invalid field of an untyped configuration', () => {
      const config: PooledConfig = JSON.parse(
        '{"encoding":{"refWidth":12,"strictPool":"yes"},"observability":{"logLevel":"loud","logFormat":"xml"}}'
      );
      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors.map(error => error.path)).toEqual([
        'encoding.refWidth',
        'encoding.strictPool',
        'observability.logLevel',
        'observability.logFormat',
      ]);
      expect(result.errors[0]).toEqual({
        path: 'encoding.refWidth',
        message: 'Reference width must be one of: 8, 16, 32',
        value: 12,
      });
    });
  });

  describe('adapters', () => {
    it('should map a configuration to column options', () => {
      const config = createConfig({ encoding: { refWidth: 8, strictPool: false } });
      const options = toColumnOptions(config);

      expect(options).toEqual({ refWidth: 8, strictPool: false, logger: undefined });
      expect(pooled(['a'], options).refWidth).toBe(8);
      expect(pooledWithPool(['a', 'b'], ['a'], options).toArray()).toEqual(['a', null]);
    });

    it('should carry the width limit into builders', () => {
      const options = toColumnOptions(createConfig({ encoding: { refWidth: 8 } }));
      const values = Array.from({ length: 256 }, (_, i) => i);
      expect(() => pooled(values, options)).toThrow(PoolCapacityError);
    });

    it('should map a configuration to logger settings', () => {
      const config = createConfig({ observability: { logLevel: 'warn', logFormat: 'pretty' } });
      expect(toLoggerConfig(config)).toEqual({ minLevel: 'warn', format: 'pretty' });
    });
  });
});
