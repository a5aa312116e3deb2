/**
 * Observability layer exports
 */

export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  createDefaultLoggingConfig,
  ConsoleLogger,
  NoopLogger,
  logRequest,
  logResponse,
  logError,
} from './logging.js';
