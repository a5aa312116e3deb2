import { z } from 'zod';
import type { RequestExecutor } from '../../transport/executor.js';
import { jsonObjectSchema, type JsonObject } from '../../types/common.js';

const projectListResponseSchema = z
  .object({ projects: z.array(jsonObjectSchema).nullish() })
  .transform((response) => response.projects ?? []);

/**
 * Endpoints about the token holder rather than a project's secrets.
 * Payloads are returned as decoded, without a typed model.
 */
export interface AccountService {
  validateToken(): Promise<JsonObject>;
  getCurrentUser(): Promise<JsonObject>;
  listProjects(): Promise<JsonObject[]>;
}

export class AccountServiceImpl implements AccountService {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Resolves with the token holder when the token is accepted; a rejected
   * token surfaces as an AuthenticationError
   */
  async validateToken(): Promise<JsonObject> {
    return this.getCurrentUser();
  }

  async getCurrentUser(): Promise<JsonObject> {
    return this.executor.execute({ method: 'GET', path: '/users/me' }, jsonObjectSchema);
  }

  async listProjects(): Promise<JsonObject[]> {
    return this.executor.execute({ method: 'GET', path: '/projects' }, projectListResponseSchema);
  }
}

export function createAccountService(executor: RequestExecutor): AccountService {
  return new AccountServiceImpl(executor);
}
