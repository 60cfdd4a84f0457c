/**
 * @pooled/config - Configuration Factory Functions
 *
 * Provides functions to create, merge and load configurations, and to turn
 * a configuration into the options columns and loggers take.
 *
 * @packageDocumentation
 */

import {
  ErrorCode,
  SUPPORTED_REF_WIDTHS,
  ValidationError,
  isRefWidth,
  type ColumnOptions,
  type ConsoleLoggerConfig,
  type Logger,
  type RefWidth,
} from '@pooled/core';

import { DEFAULT_CONFIG, LOG_FORMATS, LOG_LEVELS } from './defaults.js';
import type { DeepPartial, EnvConfigOptions, PooledConfig } from './types.js';

/**
 * Overlay `overrides` on `base`. Undefined override fields keep the base value.
 */
function mergeInto(base: PooledConfig, overrides: DeepPartial<PooledConfig> | null | undefined): PooledConfig {
  return {
    encoding: {
      refWidth: overrides?.encoding?.refWidth ?? base.encoding.refWidth,
      strictPool: overrides?.encoding?.strictPool ?? base.encoding.strictPool,
    },
    observability: {
      logLevel: overrides?.observability?.logLevel ?? base.observability.logLevel,
      logFormat: overrides?.observability?.logFormat ?? base.observability.logFormat,
    },
  };
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return obj;
}

/**
 * Create a complete, frozen PooledConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge over `base`
 * @param base - Configuration to build on (defaults to DEFAULT_CONFIG)
 *
 * @example
 * ```typescript
 * const config = createConfig({ encoding: { refWidth: 32 } });
 * const verbose = createConfig({ observability: { logLevel: 'debug' } }, config);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<PooledConfig> | null,
  base: PooledConfig = DEFAULT_CONFIG
): PooledConfig {
  return deepFreeze(mergeInto(base, overrides));
}

/**
 * Merge partial configurations. Later configurations take precedence; a
 * field no configuration sets stays undefined.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { encoding: { refWidth: 8 } },
 *   { encoding: { refWidth: 32, strictPool: false } }
 * );
 * // merged.encoding.refWidth === 32
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<PooledConfig> | null | undefined>
): DeepPartial<PooledConfig> {
  let result: DeepPartial<PooledConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    result = {
      encoding: {
        refWidth: config.encoding?.refWidth ?? result.encoding?.refWidth,
        strictPool: config.encoding?.strictPool ?? result.encoding?.strictPool,
      },
      observability: {
        logLevel: config.observability?.logLevel ?? result.observability?.logLevel,
        logFormat: config.observability?.logFormat ?? result.observability?.logFormat,
      },
    };
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function envKey(prefix: string, ...parts: string[]): string {
  return [prefix, ...parts].join('_').toUpperCase();
}

function invalidEnvValue(key: string, value: string, expected: string): ValidationError {
  return new ValidationError(
    `Invalid value for ${key}: ${JSON.stringify(value)}`,
    ErrorCode.VALIDATION_ERROR,
    { variable: key, value, expected },
    `Set ${key} to ${expected}`
  );
}

function parseRefWidth(key: string, value: string | undefined): RefWidth | undefined {
  if (value === undefined) return undefined;
  const width = Number(value);
  if (!isRefWidth(width)) {
    throw invalidEnvValue(key, value, `one of ${SUPPORTED_REF_WIDTHS.join(', ')}`);
  }
  return width;
}

function parseBoolean(key: string, value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw invalidEnvValue(key, value, 'true, false, 1 or 0');
  }
}

function parseChoice<T extends string>(key: string, value: string | undefined, choices: readonly T[]): T | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  const match = choices.find(choice => choice === normalized);
  if (match === undefined) {
    throw invalidEnvValue(key, value, `one of ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Create configuration from environment variables.
 *
 * Variables follow the pattern <PREFIX>_<SECTION>_<FIELD>:
 * - POOLED_ENCODING_REF_WIDTH=32
 * - POOLED_ENCODING_STRICT_POOL=false
 * - POOLED_OBSERVABILITY_LOG_LEVEL=debug
 * - POOLED_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * @throws {ValidationError} when a variable is set to a value its field cannot take
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const scoped = getConfigFromEnv({ prefix: 'ETL', env: { ETL_ENCODING_REF_WIDTH: '8' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): PooledConfig {
  const prefix = options.prefix ?? 'POOLED';
  const env = options.env ?? process.env;

  const read = (...parts: string[]): [string, string | undefined] => {
    const key = envKey(prefix, ...parts);
    return [key, env[key]];
  };

  return createConfig({
    encoding: {
      refWidth: parseRefWidth(...read('ENCODING', 'REF', 'WIDTH')),
      strictPool: parseBoolean(...read('ENCODING', 'STRICT', 'POOL')),
    },
    observability: {
      logLevel: parseChoice(...read('OBSERVABILITY', 'LOG', 'LEVEL'), LOG_LEVELS),
      logFormat: parseChoice(...read('OBSERVABILITY', 'LOG', 'FORMAT'), LOG_FORMATS),
    },
  });
}

// =============================================================================
// Adapters
// =============================================================================

/**
 * Column options for a configuration, ready to pass to any builder.
 *
 * @example
 * ```typescript
 * const column = pooled(values, toColumnOptions(config, logger));
 * ```
 */
export function toColumnOptions(config: PooledConfig, logger?: Logger): ColumnOptions {
  return {
    refWidth: config.encoding.refWidth,
    strictPool: config.encoding.strictPool,
    logger,
  };
}

/**
 * Console logger settings for a configuration.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger(toLoggerConfig(config));
 * ```
 */
export function toLoggerConfig(config: PooledConfig): ConsoleLoggerConfig {
  return {
    minLevel: config.observability.logLevel,
    format: config.observability.logFormat,
  };
}
