/**
 * @pooled/config - Configuration Validation
 *
 * Typed callers cannot build an invalid PooledConfig, but configurations
 * parsed from JSON or assembled in plain JavaScript can, so every field is
 * checked at runtime as well.
 *
 * @packageDocumentation
 */

import { SUPPORTED_REF_WIDTHS, isRefWidth, refCapacity } from '@pooled/core';

import { LOG_FORMATS, LOG_LEVELS } from './defaults.js';
import type {
  ConfigValidationError,
  ConfigValidationWarning,
  PooledConfig,
  ValidationResult,
} from './types.js';

/**
 * Validate a complete PooledConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(JSON.parse(text));
 * if (!result.valid) {
 *   logger.error('Invalid configuration', undefined, { errors: result.errors.map(e => e.message) });
 * }
 * ```
 */
export function validateConfig(config: PooledConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateEncodingConfig(config.encoding, errors, warnings);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateEncodingConfig(
  encoding: PooledConfig['encoding'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  const { refWidth, strictPool } = encoding;

  if (!isRefWidth(refWidth)) {
    errors.push({
      path: 'encoding.refWidth',
      message: `Reference width must be one of: ${SUPPORTED_REF_WIDTHS.join(', ')}`,
      value: refWidth,
    });
  } else if (refWidth === 8) {
    warnings.push({
      path: 'encoding.refWidth',
      message: `8-bit references address at most ${refCapacity(8)} distinct values`,
      value: refWidth,
      recommendation: 'Use 16 unless every column is known to stay small',
    });
  }

  if (typeof strictPool !== 'boolean') {
    errors.push({
      path: 'encoding.strictPool',
      message: 'strictPool must be a boolean',
      value: strictPool,
    });
  } else if (!strictPool) {
    warnings.push({
      path: 'encoding.strictPool',
      message: 'Values absent from a fixed pool will become missing instead of raising an error',
      value: strictPool,
    });
  }
}

function validateObservabilityConfig(
  observability: PooledConfig['observability'],
  errors: ConfigValidationError[]
): void {
  if (!LOG_LEVELS.includes(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
      value: observability.logLevel,
    });
  }

  if (!LOG_FORMATS.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${LOG_FORMATS.join(', ')}`,
      value: observability.logFormat,
    });
  }
}
