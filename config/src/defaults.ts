/**
 * @pooled/config - Default Configuration Values
 *
 * Values are sourced from @pooled/core constants where applicable.
 *
 * @packageDocumentation
 */

import { DEFAULT_REF_WIDTH, type LogLevel } from '@pooled/core';

import type { EncodingConfig, LogFormat, ObservabilityConfig, PooledConfig } from './types.js';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

const DEFAULT_ENCODING_CONFIG: EncodingConfig = {
  refWidth: DEFAULT_REF_WIDTH,
  strictPool: true,
};

const DEFAULT_OBSERVABILITY_CONFIG: ObservabilityConfig = {
  logLevel: 'info',
  logFormat: 'json',
};

/**
 * Complete default configuration. Frozen; build variants with createConfig().
 */
export const DEFAULT_CONFIG: PooledConfig = Object.freeze({
  encoding: Object.freeze(DEFAULT_ENCODING_CONFIG),
  observability: Object.freeze(DEFAULT_OBSERVABILITY_CONFIG),
});
