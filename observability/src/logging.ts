/**
 * Structured logging for pooled columns
 *
 * Implements the Logger abstraction declared in @pooled/core. Columns and
 * builders take an optional `logger`; these factories produce one.
 *
 * @example
 * ```typescript
 * import { pooled } from '@pooled/core';
 * import { createConsoleLogger, withContext } from '@pooled/observability';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'debug' });
 * const column = pooled(cities, { logger: withContext(logger, { column: 'city' }) });
 * // [2024-05-01T12:00:00.000Z] DEBUG Built pool {"column":"city","operation":"buildPool",...}
 * ```
 */

import type {
  ConsoleLoggerConfig,
  LogContext,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  TestLogger,
} from '@pooled/core';

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Log level constants and utilities
 */
export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that hands each entry at or above `minLevel` to `output`.
 *
 * @example
 * ```typescript
 * const entries: LogEntry[] = [];
 * const logger = createLogger({ minLevel: 'warn', output: entry => entries.push(entry) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Render an entry as one JSON line or as a human-readable line.
 */
export function formatEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }
  return output;
}

/**
 * Create a logger that writes formatted entries to the console.
 *
 * @example
 * ```typescript
 * const prodLogger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const devLogger = createConsoleLogger({ format: 'pretty' });
 * ```
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  return createLogger({
    ...config,
    output: entry => {
      console.log(formatEntry(entry, format));
    },
  });
}

/**
 * Create a logger that discards everything
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that keeps its entries in memory for assertions.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * pooled(['a', 'b'], { logger });
 * expect(logger.getLogsByLevel('debug')[0].message).toBe('Built pool');
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: entry => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that adds `context` to every entry. Context given
 * at log time wins on key collisions.
 *
 * @example
 * ```typescript
 * const columnLogger = withContext(rootLogger, { column: 'country' });
 * pooled(countries, { logger: columnLogger });
 * ```
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
