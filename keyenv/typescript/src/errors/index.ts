export { ApiError, type ApiErrorOptions } from './error.js';
export {
  ConfigurationError,
  NetworkError,
  TimeoutError,
  AuthenticationError,
  NotFoundError,
  InvalidResponseError,
} from './categories.js';
export { mapHttpError, mapTransportFailure } from './mapping.js';
