import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { Logger } from '../observability/logging.js';
import type { EnvironmentStore } from '../env/store.js';

/**
 * Default API configuration constants
 */
export const DEFAULT_BASE_URL = 'https://api.keyenv.dev';
export const DEFAULT_TIMEOUT = 30; // seconds
/** Largest delay setTimeout honours, in whole seconds */
export const MAX_TIMEOUT = 2_147_483;
export const API_PREFIX = '/api/v1';
export const CLIENT_VERSION = '0.1.0';
export const USER_AGENT = `keyenv-node/${CLIENT_VERSION}`;

/** Environment variable overriding the default base URL */
export const BASE_URL_ENV_VAR = 'KEYENV_API_URL';
/** Environment variable read by createClientFromEnv */
export const TOKEN_ENV_VAR = 'KEYENV_TOKEN';

/**
 * Configuration interface for the KeyEnv API client
 */
export interface KeyEnvConfig {
  /**
   * Service token sent as a bearer credential
   */
  token: string;

  /**
   * Request timeout in seconds.
   * @default 30
   */
  timeout?: number;

  /**
   * Base URL for the API. Falls back to KEYENV_API_URL, then to the hosted API.
   * @default 'https://api.keyenv.dev'
   */
  baseUrl?: string;

  /**
   * Custom headers to include in all requests
   */
  headers?: Record<string, string>;

  /**
   * Custom fetch implementation (useful for testing or custom environments)
   */
  fetch?: typeof fetch;

  /**
   * Replaces the fetch-based transport entirely
   */
  transport?: HttpTransport;

  logger?: Logger;

  /**
   * Where loadEnv writes secrets.
   * @default ProcessEnvironmentStore over process.env
   */
  envStore?: EnvironmentStore;

  /**
   * Clock used for the generated-at header of .env files
   */
  now?: () => Date;
}

/**
 * Configuration after defaults and validation. Collaborators that have no
 * sensible default here (transport, logger, store) stay optional.
 */
export interface ResolvedConfig {
  token: string;
  timeout: number;
  baseUrl: string;
  headers: Record<string, string>;
  fetch?: typeof fetch;
  transport?: HttpTransport;
  logger?: Logger;
  envStore?: EnvironmentStore;
  now: () => Date;
}

const settingsSchema = z.object({
  timeout: z
    .number({ invalid_type_error: 'Timeout must be a number' })
    .positive('Timeout must be a positive number of seconds')
    .max(MAX_TIMEOUT, `Timeout must not exceed ${MAX_TIMEOUT} seconds`),
  baseUrl: z.string().regex(/^https?:\/\//, 'Base URL must start with http:// or https://'),
});

/**
 * Resolves the base URL: explicit value, then KEYENV_API_URL, then the default.
 * Trailing slashes are removed.
 */
export function resolveBaseUrl(
  baseUrl: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const fromEnv = env[BASE_URL_ENV_VAR];
  const resolved = baseUrl ?? (fromEnv ? fromEnv : DEFAULT_BASE_URL);
  return resolved.replace(/\/+$/, '');
}

/**
 * Validates and normalizes the configuration
 */
export function validateConfig(
  config: KeyEnvConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  if (typeof config.token !== 'string' || config.token.length === 0) {
    throw new ConfigurationError('KeyEnv token is required');
  }

  const settings = settingsSchema.safeParse({
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    baseUrl: resolveBaseUrl(config.baseUrl, env),
  });
  if (!settings.success) {
    throw new ConfigurationError(settings.error.issues.map((issue) => issue.message).join('; '));
  }

  return {
    token: config.token,
    timeout: settings.data.timeout,
    baseUrl: settings.data.baseUrl,
    headers: config.headers ?? {},
    fetch: config.fetch,
    transport: config.transport,
    logger: config.logger,
    envStore: config.envStore,
    now: config.now ?? (() => new Date()),
  };
}
