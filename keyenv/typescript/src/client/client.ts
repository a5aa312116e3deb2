import type { KeyEnvConfig, ResolvedConfig } from '../config/config.js';
import { TOKEN_ENV_VAR, validateConfig } from '../config/config.js';
import { createAuthManager } from '../auth/auth-manager.js';
import { createHttpTransport } from '../transport/http-transport.js';
import { RequestExecutor } from '../transport/executor.js';
import { ConfigurationError } from '../errors/categories.js';
import { NoopLogger } from '../observability/logging.js';
import { SecretsServiceImpl } from '../services/secrets/service.js';
import { EnvironmentsServiceImpl } from '../services/environments/service.js';
import { AccountServiceImpl } from '../services/account/service.js';
import type { SecretsService } from '../services/secrets/service.js';
import type { EnvironmentsService } from '../services/environments/service.js';
import type { AccountService } from '../services/account/service.js';
import type { Environment } from '../types/environment.js';
import type { Secret, SecretWithValue } from '../types/secret.js';
import type { JsonObject } from '../types/common.js';

/**
 * KeyEnv API client for managing secrets
 *
 * @example
 * ```typescript
 * const client = createClient({ token: process.env.KEYENV_TOKEN ?? '' });
 *
 * const secrets = await client.getSecrets('project-id', 'production');
 * const secret = await client.getSecret('project-id', 'production', 'DATABASE_URL');
 * console.log(secret.value);
 * ```
 */
export interface KeyEnvClient extends SecretsService, EnvironmentsService, AccountService {
  /**
   * Gets the current configuration
   */
  getConfig(): Readonly<ResolvedConfig>;
}

/**
 * Implementation of the KeyEnv API client
 */
export class KeyEnvClientImpl implements KeyEnvClient {
  private readonly config: ResolvedConfig;
  private readonly secrets: SecretsService;
  private readonly environments: EnvironmentsService;
  private readonly account: AccountService;

  constructor(config: KeyEnvConfig) {
    this.config = validateConfig(config);

    const executor = new RequestExecutor({
      baseUrl: this.config.baseUrl,
      timeout: this.config.timeout,
      authManager: createAuthManager({
        token: this.config.token,
        customHeaders: this.config.headers,
      }),
      transport: this.config.transport ?? createHttpTransport(this.config.fetch),
      logger: this.config.logger ?? new NoopLogger(),
    });

    this.secrets = new SecretsServiceImpl(executor, {
      envStore: this.config.envStore,
      now: this.config.now,
    });
    this.environments = new EnvironmentsServiceImpl(executor);
    this.account = new AccountServiceImpl(executor);
  }

  getSecrets(projectId: string, environment: string): Promise<SecretWithValue[]> {
    return this.secrets.getSecrets(projectId, environment);
  }

  getSecretsAsArray(projectId: string, environment: string): Promise<Record<string, string>> {
    return this.secrets.getSecretsAsArray(projectId, environment);
  }

  getSecret(projectId: string, environment: string, key: string): Promise<SecretWithValue> {
    return this.secrets.getSecret(projectId, environment, key);
  }

  listSecrets(projectId: string, environment: string): Promise<Secret[]> {
    return this.secrets.listSecrets(projectId, environment);
  }

  createSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret> {
    return this.secrets.createSecret(projectId, environment, key, value, description);
  }

  updateSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret> {
    return this.secrets.updateSecret(projectId, environment, key, value, description);
  }

  setSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret> {
    return this.secrets.setSecret(projectId, environment, key, value, description);
  }

  deleteSecret(projectId: string, environment: string, key: string): Promise<void> {
    return this.secrets.deleteSecret(projectId, environment, key);
  }

  loadEnv(projectId: string, environment: string): Promise<number> {
    return this.secrets.loadEnv(projectId, environment);
  }

  generateEnvFile(projectId: string, environment: string): Promise<string> {
    return this.secrets.generateEnvFile(projectId, environment);
  }

  listEnvironments(projectId: string): Promise<Environment[]> {
    return this.environments.listEnvironments(projectId);
  }

  validateToken(): Promise<JsonObject> {
    return this.account.validateToken();
  }

  getCurrentUser(): Promise<JsonObject> {
    return this.account.getCurrentUser();
  }

  listProjects(): Promise<JsonObject[]> {
    return this.account.listProjects();
  }

  getConfig(): Readonly<ResolvedConfig> {
    return Object.freeze({ ...this.config });
  }
}

/**
 * Creates a new KeyEnv API client with the provided configuration
 */
export function createClient(config: KeyEnvConfig): KeyEnvClient {
  return new KeyEnvClientImpl(config);
}

/**
 * Creates a new KeyEnv API client using environment variables
 *
 * Expected environment variables:
 * - KEYENV_TOKEN (required)
 * - KEYENV_API_URL (optional)
 */
export function createClientFromEnv(overrides?: Partial<KeyEnvConfig>): KeyEnvClient {
  const token = overrides?.token ?? process.env[TOKEN_ENV_VAR];

  if (!token) {
    throw new ConfigurationError(
      `${TOKEN_ENV_VAR} environment variable is not set. ` +
      'Please set it or provide a token in the config.'
    );
  }

  return createClient({ ...overrides, token });
}
