/**
 * @pooled/observability
 *
 * Logger implementations for the Logger interface declared in @pooled/core.
 * Core only carries the types and a noop default, so columns built without
 * this package pay nothing for logging.
 *
 * @example
 * ```typescript
 * import { buildSharedPool, STRING_TRAITS } from '@pooled/core';
 * import { createConsoleLogger } from '@pooled/observability';
 *
 * const logger = createConsoleLogger({ format: 'json', minLevel: 'debug' });
 * const [left, right] = buildSharedPool(orders, customers, { traits: STRING_TRAITS, logger });
 * ```
 */

export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
  formatEntry,
  LogLevels,
} from './logging.js';

export type {
  Logger,
  LogLevel,
  LogContext,
  LogContextValue,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from '@pooled/core';
