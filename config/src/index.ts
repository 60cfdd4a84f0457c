/**
 * @pooled/config - Configuration for pooled columns
 *
 * Defaults, deep-partial overrides, environment loading and validation, plus
 * adapters that turn a configuration into column options and logger settings.
 *
 * @example
 * ```typescript
 * import { getConfigFromEnv, toColumnOptions, toLoggerConfig, validateConfig } from '@pooled/config';
 * import { createConsoleLogger } from '@pooled/observability';
 * import { pooled } from '@pooled/core';
 *
 * const config = getConfigFromEnv();
 * const result = validateConfig(config);
 * const logger = createConsoleLogger(toLoggerConfig(config));
 * for (const warning of result.warnings) logger.warn(warning.message, { path: warning.path });
 *
 * const column = pooled(values, toColumnOptions(config, logger));
 * ```
 *
 * @packageDocumentation
 * @module @pooled/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  DeepPartial,
  EncodingConfig,
  LogFormat,
  ObservabilityConfig,
  PooledConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG, LOG_LEVELS, LOG_FORMATS } from './defaults.js';

// =============================================================================
// Factory Functions
// =============================================================================

export {
  createConfig,
  mergeConfigs,
  getConfigFromEnv,
  toColumnOptions,
  toLoggerConfig,
} from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';
