/**
 * @pooled/config - Type Definitions
 *
 * Configuration schema for pooled column construction and logging.
 *
 * @packageDocumentation
 * @module @pooled/config
 */

import type { LogLevel, RefWidth } from '@pooled/core';

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
// Sections
// =============================================================================

/**
 * How builders encode columns.
 *
 * @example
 * ```typescript
 * const encoding: EncodingConfig = { refWidth: 32, strictPool: true };
 * ```
 */
export interface EncodingConfig {
  /** Reference width in bits; bounds the pool at 2^w - 1 distinct values */
  refWidth: RefWidth;

  /**
   * Raise ValueNotInPoolError for values absent from a caller-fixed pool.
   * When false they become missing and one warning is logged.
   */
  strictPool: boolean;
}

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum level a configured logger emits */
  logLevel: LogLevel;

  logFormat: LogFormat;
}

export interface PooledConfig {
  encoding: EncodingConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation
// =============================================================================

export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'encoding.refWidth') */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ConfigValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment
// =============================================================================

export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'POOLED') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
