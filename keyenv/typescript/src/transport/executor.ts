import type { z } from 'zod';
import type { AuthManager } from '../auth/auth-manager.js';
import type { ApiError } from '../errors/error.js';
import { InvalidResponseError } from '../errors/categories.js';
import { mapHttpError, mapTransportFailure } from '../errors/mapping.js';
import { API_PREFIX } from '../config/config.js';
import type { HttpMethod, Result } from '../types/common.js';
import { decodeWith } from '../types/common.js';
import type { HttpTransport } from './http-transport.js';
import { type Logger, NoopLogger, logError, logRequest, logResponse } from '../observability/logging.js';

export interface ApiRequest {
  method: HttpMethod;
  /**
   * Path below `/api/v1`, starting with a slash
   */
  path: string;
  body?: unknown;
}

export interface RequestExecutorOptions {
  baseUrl: string;
  /**
   * Timeout in seconds
   */
  timeout: number;
  authManager: AuthManager;
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * Decodes a response body. An empty body decodes to nothing; a body that is
 * not JSON is wrapped as `{ error: <text> }` so status handling still has a
 * message to surface.
 */
export function decodeBody(text: string): unknown {
  if (text === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { error: text };
  }
}

/**
 * Runs API requests and collapses every outcome into a decoded value or an
 * ApiError
 */
export class RequestExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: RequestExecutorOptions) {
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Performs the request and validates the payload with `schema`
   */
  async attempt<T>(
    request: ApiRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T>> {
    const { method, path } = request;
    const startedAt = Date.now();
    logRequest(this.logger, method, path);

    const outcome = await this.options.transport.send({
      method,
      url: `${this.options.baseUrl}${API_PREFIX}${path}`,
      headers: this.options.authManager.getHeaders(),
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      timeoutMs: this.options.timeout * 1000,
    });

    if (outcome.kind === 'failure') {
      return this.fail(mapTransportFailure(outcome.message, outcome.timedOut, outcome.cause), `${method} ${path}`);
    }

    logResponse(this.logger, method, path, outcome.status, Date.now() - startedAt);

    const payload = outcome.status === 204 ? {} : decodeBody(outcome.body);

    if (outcome.status >= 400) {
      return this.fail(mapHttpError(outcome.status, payload), `${method} ${path}`);
    }

    try {
      return { ok: true, value: decodeWith(schema, payload ?? {}, outcome.status) };
    } catch (error) {
      if (error instanceof InvalidResponseError) {
        return this.fail(error, `${method} ${path}`);
      }
      throw error;
    }
  }

  /**
   * Like attempt, but throws the ApiError of a failed request
   */
  async execute<T>(
    request: ApiRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const result = await this.attempt(request, schema);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  private fail(error: ApiError, context: string): Result<never> {
    logError(this.logger, error, context);
    return { ok: false, error };
  }
}
