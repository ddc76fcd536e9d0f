/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * setDefaultLogger(pino({ level: 'debug' }));
 * ```
 *
 * @example Winston
 * ```typescript
 * import winston from 'winston';
 * const protocol = new FtpProtocol({ logger: winston.createLogger({ level: 'debug' }) });
 * ```
 *
 * @example Console (default)
 * ```typescript
 * const protocol = new FtpProtocol({ logger: console });
 * ```
 */
export interface Logger {
  /**
   * Debug level logging
   * Called for command tracing and unparsable listing lines
   */
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Info level logging
   */
  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Warn level logging
   * Called for skipped MLSD lines
   */
  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Error level logging
   * Called for unparsable replies and failed commands
   */
  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'none'];

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => {
    console.debug(msgOrObj, ...args);
  },
  info: (msgOrObj: string | object, ...args: unknown[]) => {
    console.info(msgOrObj, ...args);
  },
  warn: (msgOrObj: string | object, ...args: unknown[]) => {
    console.warn(msgOrObj, ...args);
  },
  error: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
};

/**
 * Silent logger - no output
 * Useful for testing or when you want to completely disable logging
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];
  const enabled = (level: Exclude<LogLevel, 'none'>) => levels[level] >= minLevelNum;

  return {
    debug: enabled('debug') ? baseLogger.debug.bind(baseLogger) : silentLogger.debug,
    info: enabled('info') ? baseLogger.info.bind(baseLogger) : silentLogger.info,
    warn: enabled('warn') ? baseLogger.warn.bind(baseLogger) : silentLogger.warn,
    error: enabled('error') ? baseLogger.error.bind(baseLogger) : silentLogger.error,
  };
}

let defaultLogger: Logger = createLevelLogger(consoleLogger, 'warn');

/**
 * Process-wide logger used when an operation is not given one
 */
export function getDefaultLogger(): Logger {
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}
