/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output.
 * warn and error go to stderr so they stay out of piped .env output.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Renders one log line without writing it
   */
  format(level: LogLevel, message: string, context?: Record<string, unknown>, now: Date = new Date()): string {
    const timestamp = this.config.includeTimestamps ? now.toISOString() : undefined;

    if (this.config.format === 'json') {
      return JSON.stringify({ timestamp, level, message, ...context });
    }

    if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      return `[${level.toUpperCase()}] ${message}${contextStr}`;
    }

    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (context) {
      parts.push('\n  ' + Object.entries(context)
        .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
        .join('\n  '));
    }
    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const line = this.format(level, message, context);
    if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * No-op logger, the client default
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Logs an outgoing HTTP request. Bodies carry secret values and are never logged.
 */
export function logRequest(logger: Logger, method: string, path: string): void {
  logger.debug('Outgoing request', { method, path });
}

/**
 * Logs an incoming HTTP response
 */
export function logResponse(
  logger: Logger,
  method: string,
  path: string,
  status: number,
  durationMs: number
): void {
  logger.debug('Incoming response', { method, path, status, durationMs });
}

/**
 * Logs a failed request with its classification
 */
export function logError(
  logger: Logger,
  error: { name: string; message: string; statusCode: number; errorCode?: string },
  context: string
): void {
  logger.warn('Request failed', {
    context,
    errorName: error.name,
    errorMessage: error.message,
    statusCode: error.statusCode,
    errorCode: error.errorCode,
  });
}
