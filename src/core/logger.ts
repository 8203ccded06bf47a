/**
 * Logger Interface
 * Structured logging abstraction; the library never logs unless given a logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log context - additional metadata for log entries
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

/**
 * Console logger that drops entries below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const line = `[${level.toUpperCase()}] ${message}`;
    if (context) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Create a prefixed logger that adds a component prefix to all messages
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    debug: (message, context) => logger.debug(`[${prefix}] ${message}`, context),
    info: (message, context) => logger.info(`[${prefix}] ${message}`, context),
    warn: (message, context) => logger.warn(`[${prefix}] ${message}`, context),
    error: (message, context) => logger.error(`[${prefix}] ${message}`, context),
  };
}
