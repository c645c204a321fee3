/**
 * Logger Interface
 * Provides structured logging abstraction for the library
 */

/**
 * Log levels supported by the logger
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

/**
 * No-op logger that silently discards all log messages
 * Default for every client
 */
/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

function write(level: LogLevel, message: string, context?: LogContext): void {
  const line = `[${level.toUpperCase()}] ${message}`;
  if (context) {
    console[level](line, context);
  } else {
    console[level](line);
  }
}

/**
 * Console logger that outputs to console with structured context
 */
export const consoleLogger: Logger = {
  debug: (message, context) => write('debug', message, context),
  info: (message, context) => write('info', message, context),
  warn: (message, context) => write('warn', message, context),
  error: (message, context) => write('error', message, context),
};

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

// ============ Sanitizing ============

const MAX_LOG_LENGTH = 2000;
const TRUNCATION_SUFFIX = '...(truncated)';
const REDACTED_FIELDS = /"(privateKey|raw)"\s*:\s*"0x[^"]+"/g;

/**
 * Redact key material and raw transaction payloads from a log string and cap its length
 */
export function sanitizeForLog(input: string | null | undefined): string {
  if (input === null || input === undefined) {
    return 'null';
  }

  let sanitized = input.replace(REDACTED_FIELDS, '"$1":"0x***[REDACTED]***"');

  if (sanitized.length > MAX_LOG_LENGTH) {
    sanitized = sanitized.slice(0, MAX_LOG_LENGTH - TRUNCATION_SUFFIX.length) + TRUNCATION_SUFFIX;
  }

  return sanitized;
}
