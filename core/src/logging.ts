/**
 * Structured Logging
 *
 * Lightweight logger abstraction. Library code accepts an optional Logger
 * through its options and stays silent when none is given.
 *
 * @example
 * ```ts
 * import { buildVariantSchema, createConsoleLogger, scalarShape, longType } from '@variant-shredding/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'debug' });
 * buildVariantSchema(scalarShape(longType()), { logger });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Allowed value types in log context (JSON-serializable).
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Operation being performed */
  operation?: string;
  /** Variant column name */
  column?: string;
  /** Error code for error logs */
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry with all metadata
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Custom output function for log entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** Output format: 'json' for structured logs, 'pretty' for human-readable */
  format?: 'json' | 'pretty';
}

/**
 * Logger that captures entries for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// ============================================================================
// Log Level Utilities
// ============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Check if a level is at least as high as a minimum level.
 */
export function isLevelAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

// ============================================================================
// Logger Factory Functions
// ============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isLevelAtLeast(level, minLevel)) return;

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
 * Format a log entry as a single JSON line or a human-readable line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
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
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;

  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }

  return line;
}

/**
 * Create a logger that writes to the console.
 *
 * @example
 * ```ts
 * const prodLogger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const devLogger = createConsoleLogger({ format: 'pretty' });
 * ```
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (entry.level === 'error') {
        console.error(line);
      } else if (entry.level === 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a test logger that captures log entries for assertions.
 *
 * @example
 * ```ts
 * const logger = createTestLogger();
 * schema.promoteToTyped(1, { logger });
 * expect(logger.getLogsByLevel('debug')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
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
      return logs.filter((entry) => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// ============================================================================
// Child Logger / Context
// ============================================================================

/**
 * Create a child logger whose entries carry `context` merged under any
 * context given at log time.
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
