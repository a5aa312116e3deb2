import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { RequestExecutor, decodeBody } from '../executor.js';
import { createAuthManager } from '../../auth/auth-manager.js';
import {
  ApiError,
  AuthenticationError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  TimeoutError,
} from '../../errors/index.js';
import { jsonObjectSchema } from '../../types/common.js';
import type { Logger } from '../../observability/logging.js';
import {
  createMockHttpTransport,
  mockHttpTransportFailure,
  mockHttpTransportResponse,
  sentRequest,
  type MockHttpTransport,
} from '../../__mocks__/http-transport.mock.js';

function createRecordingLogger(): Logger & { calls: Array<[string, string, Record<string, unknown> | undefined]> } {
  const calls: Array<[string, string, Record<string, unknown> | undefined]> = [];
  const record = (level: string) => (message: string, context?: Record<string, unknown>) => {
    calls.push([level, message, context]);
  };
  return {
    calls,
    trace: record('trace'),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

describe('decodeBody', () => {
  it('should decode JSON', () => {
    expect(decodeBody('{"a":1}')).toEqual({ a: 1 });
  });

  it('should decode nothing from an empty body', () => {
    expect(decodeBody('')).toBeUndefined();
  });

  it('should wrap text that is not JSON', () => {
    expect(decodeBody('Internal Server Error')).toEqual({ error: 'Internal Server Error' });
  });
});

describe('RequestExecutor', () => {
  let transport: MockHttpTransport;
  let executor: RequestExecutor;

  beforeEach(() => {
    transport = createMockHttpTransport();
    executor = new RequestExecutor({
      baseUrl: 'https://api.keyenv.test',
      timeout: 30,
      authManager: createAuthManager({ token: 'test-token' }),
      transport,
    });
  });

  describe('request building', () => {
    it('should prefix the path and send the auth headers', async () => {
      mockHttpTransportResponse(transport, 200, { id: 'user_1' });

      await executor.execute({ method: 'GET', path: '/users/me' }, jsonObjectSchema);

      expect(sentRequest(transport)).toEqual({
        method: 'GET',
        url: 'https://api.keyenv.test/api/v1/users/me',
        headers: {
          'Authorization': 'Bearer test-token',
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          'User-Agent': 'keyenv-node/0.1.0',
        },
        body: undefined,
        timeoutMs: 30000,
      });
    });

    it('should JSON-encode a body when one is given', async () => {
      mockHttpTransportResponse(transport, 200, {});

      await executor.execute(
        { method: 'POST', path: '/projects', body: { key: 'A', value: 'has "quotes"' } },
        z.unknown()
      );

      expect(sentRequest(transport).body).toBe('{"key":"A","value":"has \\"quotes\\""}');
    });
  });

  describe('success', () => {
    it('should return the decoded payload', async () => {
      mockHttpTransportResponse(transport, 200, { email: 'dev@example.com' });

      const result = await executor.execute({ method: 'GET', path: '/users/me' }, jsonObjectSchema);

      expect(result).toEqual({ email: 'dev@example.com' });
    });

    it('should return an empty object for 204 without decoding', async () => {
      mockHttpTransportResponse(transport, 204, 'not json at all');

      const result = await executor.execute({ method: 'DELETE', path: '/x' }, jsonObjectSchema);

      expect(result).toEqual({});
    });

    it('should return an empty object for an empty 200 body', async () => {
      mockHttpTransportResponse(transport, 200);

      const result = await executor.execute({ method: 'GET', path: '/x' }, jsonObjectSchema);

      expect(result).toEqual({});
    });

    it('should return an empty object for a JSON null body', async () => {
      mockHttpTransportResponse(transport, 200, 'null');

      const result = await executor.execute({ method: 'GET', path: '/x' }, jsonObjectSchema);

      expect(result).toEqual({});
    });

    it('should raise InvalidResponseError with the response status on a shape mismatch', async () => {
      mockHttpTransportResponse(transport, 201, { count: 'many' });

      const error = await executor
        .execute({ method: 'GET', path: '/x' }, z.object({ count: z.number() }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({ statusCode: 201, errorCode: 'invalid_response' });
    });
  });

  describe('HTTP errors', () => {
    it('should surface a non-JSON body as the message', async () => {
      mockHttpTransportResponse(transport, 500, 'Internal Server Error');

      const error = await executor.execute({ method: 'GET', path: '/x' }, z.unknown()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ statusCode: 500, message: 'Internal Server Error' });
    });

    it('should take message, code and details from a JSON error body', async () => {
      mockHttpTransportResponse(transport, 409, {
        error: 'Secret already exists',
        code: 'SECRET_EXISTS',
        details: { key: 'API_KEY' },
      });

      const error = await executor.execute({ method: 'POST', path: '/x' }, z.unknown()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        statusCode: 409,
        message: 'Secret already exists',
        errorCode: 'SECRET_EXISTS',
        details: { key: 'API_KEY' },
      });
    });

    it('should use the generic message for an empty error body', async () => {
      mockHttpTransportResponse(transport, 503);

      await expect(executor.execute({ method: 'GET', path: '/x' }, z.unknown())).rejects.toThrow('Unknown error');
    });

    it('should classify 401 and 404', async () => {
      mockHttpTransportResponse(transport, 401, { error: 'Invalid token' });
      mockHttpTransportResponse(transport, 404, { error: 'Secret not found' });

      await expect(executor.execute({ method: 'GET', path: '/a' }, z.unknown())).rejects.toBeInstanceOf(
        AuthenticationError
      );
      await expect(executor.execute({ method: 'GET', path: '/b' }, z.unknown())).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('transport failures', () => {
    it('should raise a 408 TimeoutError when the transport times out', async () => {
      mockHttpTransportFailure(transport, 'This operation was aborted', true);

      const error = await executor.execute({ method: 'GET', path: '/x' }, z.unknown()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ statusCode: 408, message: 'Request timeout' });
    });

    it('should raise a status 0 NetworkError with the transport text', async () => {
      mockHttpTransportFailure(transport, 'getaddrinfo ENOTFOUND api.keyenv.test');

      const error = await executor.execute({ method: 'GET', path: '/x' }, z.unknown()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ statusCode: 0, message: 'getaddrinfo ENOTFOUND api.keyenv.test' });
    });

    it('should fall back to a generic message for an empty transport error', async () => {
      mockHttpTransportFailure(transport, '');

      await expect(executor.execute({ method: 'GET', path: '/x' }, z.unknown())).rejects.toThrow('Network error');
    });
  });

  describe('attempt', () => {
    it('should return the failure variant instead of throwing', async () => {
      mockHttpTransportResponse(transport, 404, { error: 'Secret not found' });

      const result = await executor.attempt({ method: 'GET', path: '/x' }, z.unknown());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.isNotFound()).toBe(true);
        expect(result.error.message).toBe('Secret not found');
      }
    });

    it('should return the success variant', async () => {
      mockHttpTransportResponse(transport, 200, { id: 'x' });

      const result = await executor.attempt({ method: 'GET', path: '/x' }, jsonObjectSchema);

      expect(result).toEqual({ ok: true, value: { id: 'x' } });
    });
  });

  describe('logging', () => {
    it('should log method, path and status but never the body', async () => {
      const logger = createRecordingLogger();
      const logged = new RequestExecutor({
        baseUrl: 'https://api.keyenv.test',
        timeout: 30,
        authManager: createAuthManager({ token: 'test-token' }),
        transport,
        logger,
      });
      mockHttpTransportResponse(transport, 200, {});

      await logged.execute({ method: 'PUT', path: '/s/API_KEY', body: { value: 'test-secret' } }, z.unknown());

      expect(logger.calls.map(([level, message]) => [level, message])).toEqual([
        ['debug', 'Outgoing request'],
        ['debug', 'Incoming response'],
      ]);
      expect(logger.calls[0]?.[2]).toEqual({ method: 'PUT', path: '/s/API_KEY' });
      expect(logger.calls[1]?.[2]).toMatchObject({ method: 'PUT', path: '/s/API_KEY', status: 200 });
      expect(JSON.stringify(logger.calls)).not.toContain('test-secret');
    });

    it('should log failures at warn level', async () => {
      const logger = createRecordingLogger();
      const warn = vi.spyOn(logger, 'warn');
      const logged = new RequestExecutor({
        baseUrl: 'https://api.keyenv.test',
        timeout: 30,
        authManager: createAuthManager({ token: 'test-token' }),
        transport,
        logger,
      });
      mockHttpTransportResponse(transport, 404, { error: 'Secret not found' });

      await logged.attempt({ method: 'GET', path: '/s/MISSING' }, z.unknown());

      expect(warn).toHaveBeenCalledWith('Request failed', {
        context: 'GET /s/MISSING',
        errorName: 'NotFoundError',
        errorMessage: 'Secret not found',
        statusCode: 404,
        errorCode: undefined,
      });
    });
  });
});
