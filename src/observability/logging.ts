/**
 * Structured logging utilities
 * @module s3-complete-multipart/observability/logging
 */

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const LOG_PREFIX = 's3-complete-multipart';

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.info(line),
  debug: (line) => console.debug(line),
  trace: (line) => console.debug(line),
};

/**
 * Console-based logger.
 *
 * Lines read `<ISO time> <LEVEL> s3-complete-multipart: <message> [<context JSON>]`
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const line = [new Date().toISOString(), level.toUpperCase(), `${LOG_PREFIX}:`, message];
    if (context !== undefined && Object.keys(context).length > 0) {
      line.push(JSON.stringify(context));
    }

    CONSOLE_WRITERS[level](line.join(' '));
  }
}

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}

  trace(_message: string, _context?: LogContext): void {}
}

/**
 * Log context describing a request. Header values are left out since they
 * may carry SSE-C key material.
 */
export function describeRequest(request: {
  readonly method: string;
  readonly path: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
}): LogContext {
  return {
    method: request.method,
    path: request.path,
    headerNames: Object.keys(request.headers),
    bodyBytes: request.body.length,
  };
}

/**
 * Logs a failed operation
 */
export function logError(logger: Logger, operation: string, error: Error): void {
  logger.error('S3 operation failed', {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}
