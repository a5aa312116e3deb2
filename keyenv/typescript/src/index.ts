/**
 * keyenv-client
 *
 * TypeScript client for the KeyEnv secrets API
 *
 * @example
 * ```typescript
 * import { createClient, createClientFromEnv } from 'keyenv-client';
 *
 * // Create client with explicit configuration
 * const client = createClient({ token: 'test-token', timeout: 10 });
 *
 * // Or create from the KEYENV_TOKEN environment variable
 * const client = createClientFromEnv();
 *
 * await client.loadEnv('project-id', 'production');
 * ```
 */

// Client exports
export {
  createClient,
  createClientFromEnv,
  KeyEnvClientImpl,
  type KeyEnvClient,
} from './client/client.js';

// Configuration exports
export {
  type KeyEnvConfig,
  type ResolvedConfig,
  validateConfig,
  resolveBaseUrl,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  MAX_TIMEOUT,
  API_PREFIX,
  USER_AGENT,
  BASE_URL_ENV_VAR,
  TOKEN_ENV_VAR,
} from './config/config.js';

// Error exports
export {
  ApiError,
  type ApiErrorOptions,
  ConfigurationError,
  NetworkError,
  TimeoutError,
  AuthenticationError,
  NotFoundError,
  InvalidResponseError,
  mapHttpError,
  mapTransportFailure,
} from './errors/index.js';

// Type exports
export {
  type HttpMethod,
  type JsonObject,
  type Result,
  type Secret,
  type SecretWithValue,
  type SecretWire,
  type SecretWithValueWire,
  type Environment,
  type EnvironmentWire,
  unwrapRecord,
  secretFromResponse,
  secretWithValueFromResponse,
  secretToWire,
  secretWithValueToWire,
  environmentFromResponse,
  environmentToWire,
} from './types/index.js';

// Auth exports
export {
  type AuthManager,
  BearerAuthManager,
  createAuthManager,
} from './auth/auth-manager.js';

// Transport exports
export {
  type HttpRequest,
  type HttpTransport,
  type TransportOutcome,
  type ApiRequest,
  FetchHttpTransport,
  createHttpTransport,
  RequestExecutor,
} from './transport/index.js';

// Service exports
export {
  type SecretsService,
  type SecretsServiceOptions,
  type EnvironmentsService,
  type AccountService,
  SecretsServiceImpl,
  EnvironmentsServiceImpl,
  AccountServiceImpl,
  createSecretsService,
  createEnvironmentsService,
  createAccountService,
} from './services/index.js';

// Env file and environment store exports
export {
  type EnvFileEntry,
  type EnvironmentStore,
  formatEnvLine,
  serializeEnvFile,
  ProcessEnvironmentStore,
  InMemoryEnvironmentStore,
} from './env/index.js';

// Observability exports
export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  ConsoleLogger,
  NoopLogger,
} from './observability/index.js';

// Version
export { CLIENT_VERSION as VERSION } from './config/config.js';
