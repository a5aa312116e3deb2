import { z } from 'zod';
import type { ApiRequest, RequestExecutor } from '../../transport/executor.js';
import type { EnvironmentStore } from '../../env/store.js';
import { ProcessEnvironmentStore } from '../../env/store.js';
import { serializeEnvFile } from '../../env/serializer.js';
import {
  secretListResponseSchema,
  secretResponseSchema,
  secretWithValueListResponseSchema,
  secretWithValueResponseSchema,
  type Secret,
  type SecretWithValue,
} from '../../types/secret.js';
import { secretsExportPath, secretsPath } from '../paths.js';
import type { SecretWriteRequest } from './types.js';

export interface SecretsService {
  getSecrets(projectId: string, environment: string): Promise<SecretWithValue[]>;
  getSecretsAsArray(projectId: string, environment: string): Promise<Record<string, string>>;
  getSecret(projectId: string, environment: string, key: string): Promise<SecretWithValue>;
  listSecrets(projectId: string, environment: string): Promise<Secret[]>;
  createSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret>;
  updateSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret>;
  setSecret(projectId: string, environment: string, key: string, value: string, description?: string): Promise<Secret>;
  deleteSecret(projectId: string, environment: string, key: string): Promise<void>;
  loadEnv(projectId: string, environment: string): Promise<number>;
  generateEnvFile(projectId: string, environment: string): Promise<string>;
}

export interface SecretsServiceOptions {
  envStore?: EnvironmentStore;
  now?: () => Date;
}

function writeBody(value: string, description: string | undefined, key?: string): SecretWriteRequest {
  const body: SecretWriteRequest = key === undefined ? { value } : { key, value };
  if (description !== undefined) {
    body.description = description;
  }
  return body;
}

function updateRequest(
  projectId: string,
  environment: string,
  key: string,
  value: string,
  description: string | undefined
): ApiRequest {
  return {
    method: 'PUT',
    path: secretsPath(projectId, environment, key),
    body: writeBody(value, description),
  };
}

export class SecretsServiceImpl implements SecretsService {
  private readonly envStore: EnvironmentStore;
  private readonly now: () => Date;

  constructor(
    private readonly executor: RequestExecutor,
    options: SecretsServiceOptions = {},
  ) {
    this.envStore = options.envStore ?? new ProcessEnvironmentStore();
    this.now = options.now ?? (() => new Date());
  }

  async getSecrets(projectId: string, environment: string): Promise<SecretWithValue[]> {
    return this.executor.execute(
      { method: 'GET', path: secretsExportPath(projectId, environment) },
      secretWithValueListResponseSchema
    );
  }

  async getSecretsAsArray(projectId: string, environment: string): Promise<Record<string, string>> {
    const secrets = await this.getSecrets(projectId, environment);
    // fromEntries defines own properties, so a `__proto__` key is kept
    return Object.fromEntries(secrets.map((secret) => [secret.key, secret.value]));
  }

  async getSecret(projectId: string, environment: string, key: string): Promise<SecretWithValue> {
    return this.executor.execute(
      { method: 'GET', path: secretsPath(projectId, environment, key) },
      secretWithValueResponseSchema
    );
  }

  async listSecrets(projectId: string, environment: string): Promise<Secret[]> {
    return this.executor.execute(
      { method: 'GET', path: secretsPath(projectId, environment) },
      secretListResponseSchema
    );
  }

  async createSecret(
    projectId: string,
    environment: string,
    key: string,
    value: string,
    description?: string
  ): Promise<Secret> {
    return this.executor.execute(
      {
        method: 'POST',
        path: secretsPath(projectId, environment),
        body: writeBody(value, description, key),
      },
      secretResponseSchema
    );
  }

  async updateSecret(
    projectId: string,
    environment: string,
    key: string,
    value: string,
    description?: string
  ): Promise<Secret> {
    return this.executor.execute(
      updateRequest(projectId, environment, key, value, description),
      secretResponseSchema
    );
  }

  /**
   * Updates the secret, creating it when the update reports not-found.
   * Any other failure is thrown unchanged.
   */
  async setSecret(
    projectId: string,
    environment: string,
    key: string,
    value: string,
    description?: string
  ): Promise<Secret> {
    const updated = await this.executor.attempt(
      updateRequest(projectId, environment, key, value, description),
      secretResponseSchema
    );

    if (updated.ok) {
      return updated.value;
    }
    if (!updated.error.isNotFound()) {
      throw updated.error;
    }
    return this.createSecret(projectId, environment, key, value, description);
  }

  async deleteSecret(projectId: string, environment: string, key: string): Promise<void> {
    await this.executor.execute(
      { method: 'DELETE', path: secretsPath(projectId, environment, key) },
      z.unknown()
    );
  }

  /**
   * Writes every secret of the environment into the environment store and
   * returns how many were written
   */
  async loadEnv(projectId: string, environment: string): Promise<number> {
    const secrets = await this.getSecrets(projectId, environment);
    for (const secret of secrets) {
      this.envStore.set(secret.key, secret.value);
    }
    return secrets.length;
  }

  async generateEnvFile(projectId: string, environment: string): Promise<string> {
    const secrets = await this.getSecrets(projectId, environment);
    return serializeEnvFile(secrets, environment, this.now());
  }
}

export function createSecretsService(
  executor: RequestExecutor,
  options?: SecretsServiceOptions
): SecretsService {
  return new SecretsServiceImpl(executor, options);
}
