import { ApiError } from './error.js';

/**
 * Error thrown when the client is misconfigured (e.g., missing token, invalid base URL).
 * Raised before any request is attempted, so it is not an ApiError.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the request never reached the server (DNS, refused connection, TLS)
 */
export class NetworkError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super({ message: message || 'Network error', statusCode: 0, cause });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a request exceeds the configured timeout, or the server answers 408
 */
export class TimeoutError extends ApiError {
  constructor(message = 'Request timeout', errorCode?: string, details?: Record<string, unknown>) {
    super({ message, statusCode: 408, errorCode, details });
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when the service token is rejected (401)
 */
export class AuthenticationError extends ApiError {
  constructor(message: string, errorCode?: string, details?: Record<string, unknown>) {
    super({ message, statusCode: 401, errorCode, details });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when a project, environment or secret does not exist (404)
 */
export class NotFoundError extends ApiError {
  constructor(message: string, errorCode?: string, details?: Record<string, unknown>) {
    super({ message, statusCode: 404, errorCode, details });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a successful response does not have the expected shape
 */
export class InvalidResponseError extends ApiError {
  constructor(statusCode: number, issues: Array<{ path: string; message: string }>) {
    super({
      message: 'Unexpected response shape',
      statusCode,
      errorCode: 'invalid_response',
      details: { issues },
    });
    this.name = 'InvalidResponseError';
  }
}
