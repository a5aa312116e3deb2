import { describe, it, expect } from 'vitest';
import { ApiError } from '../error.js';
import {
  AuthenticationError,
  ConfigurationError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  TimeoutError,
} from '../categories.js';
import { mapHttpError, mapTransportFailure } from '../mapping.js';

describe('ApiError', () => {
  it('should expose status, code and details', () => {
    const error = new ApiError({
      message: 'Not found',
      statusCode: 404,
      errorCode: 'NOT_FOUND',
      details: { resource: 'secret' },
    });

    expect(error.message).toBe('Not found');
    expect(error.statusCode).toBe(404);
    expect(error.errorCode).toBe('NOT_FOUND');
    expect(error.details).toEqual({ resource: 'secret' });
    expect(error.name).toBe('ApiError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should default to status 0 and empty details', () => {
    const error = new ApiError({ message: 'boom' });

    expect(error.statusCode).toBe(0);
    expect(error.errorCode).toBeUndefined();
    expect(error.details).toEqual({});
  });

  it('should freeze details', () => {
    const error = new ApiError({ message: 'x', details: { a: 1 } });

    expect(Object.isFrozen(error.details)).toBe(true);
  });

  describe('classification', () => {
    const statuses = [0, 200, 400, 401, 403, 404, 408, 409, 429, 500, 503];

    it.each(statuses)('should derive predicates from status %i only', (statusCode) => {
      const error = new ApiError({ message: 'x', statusCode });

      expect(error.isNotFound()).toBe(statusCode === 404);
      expect(error.isUnauthorized()).toBe(statusCode === 401);
      expect(error.isTimeout()).toBe(statusCode === 408);
    });

    it.each(statuses)('should match at most one predicate for status %i', (statusCode) => {
      const error = new ApiError({ message: 'x', statusCode });
      const matches = [error.isNotFound(), error.isUnauthorized(), error.isTimeout()].filter(Boolean);

      expect(matches.length).toBeLessThanOrEqual(1);
    });
  });

  it('should serialize to JSON without the stack', () => {
    const error = new ApiError({ message: 'Conflict', statusCode: 409, errorCode: 'DUPLICATE' });

    expect(error.toJSON()).toEqual({
      name: 'ApiError',
      message: 'Conflict',
      statusCode: 409,
      errorCode: 'DUPLICATE',
      details: {},
    });
  });
});

describe('error categories', () => {
  it('should keep every category inside the ApiError family', () => {
    expect(new NetworkError('down')).toBeInstanceOf(ApiError);
    expect(new TimeoutError()).toBeInstanceOf(ApiError);
    expect(new AuthenticationError('no')).toBeInstanceOf(ApiError);
    expect(new NotFoundError('gone')).toBeInstanceOf(ApiError);
    expect(new InvalidResponseError(200, [])).toBeInstanceOf(ApiError);
  });

  it('should keep ConfigurationError outside the ApiError family', () => {
    const error = new ConfigurationError('KeyEnv token is required');

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(ApiError);
    expect(error.name).toBe('ConfigurationError');
  });

  it('should fall back to a generic network message', () => {
    const error = new NetworkError('');

    expect(error.message).toBe('Network error');
    expect(error.statusCode).toBe(0);
  });

  it('should synthesize a timeout as 408', () => {
    const error = new TimeoutError();

    expect(error.message).toBe('Request timeout');
    expect(error.statusCode).toBe(408);
    expect(error.isTimeout()).toBe(true);
  });

  it('should carry validation issues on InvalidResponseError', () => {
    const error = new InvalidResponseError(200, [{ path: 'id', message: 'Required' }]);

    expect(error.statusCode).toBe(200);
    expect(error.errorCode).toBe('invalid_response');
    expect(error.details).toEqual({ issues: [{ path: 'id', message: 'Required' }] });
  });
});

describe('mapHttpError', () => {
  it('should take message, code and details from the body', () => {
    const error = mapHttpError(422, {
      error: 'Invalid key',
      code: 'INVALID_KEY',
      details: { field: 'key' },
    });

    expect(error).toBeInstanceOf(ApiError);
    expect(error.message).toBe('Invalid key');
    expect(error.statusCode).toBe(422);
    expect(error.errorCode).toBe('INVALID_KEY');
    expect(error.details).toEqual({ field: 'key' });
  });

  it('should use the generic message when the body has no error field', () => {
    const error = mapHttpError(500, {});

    expect(error.message).toBe('Unknown error');
    expect(error.errorCode).toBeUndefined();
    expect(error.details).toEqual({});
  });

  it('should use the generic message when there is no body', () => {
    expect(mapHttpError(502, undefined).message).toBe('Unknown error');
  });

  it('should ignore fields of the wrong type', () => {
    const error = mapHttpError(400, { error: 42, code: ['x'], details: 'nope' });

    expect(error.message).toBe('Unknown error');
    expect(error.errorCode).toBeUndefined();
    expect(error.details).toEqual({});
  });

  it('should map 401, 404 and 408 to their categories', () => {
    expect(mapHttpError(401, { error: 'Invalid token' })).toBeInstanceOf(AuthenticationError);
    expect(mapHttpError(404, { error: 'Secret not found' })).toBeInstanceOf(NotFoundError);
    expect(mapHttpError(408, { error: 'Slow' })).toBeInstanceOf(TimeoutError);
  });

  it('should keep the server message on a 408', () => {
    const error = mapHttpError(408, { error: 'Upstream timed out' });

    expect(error.message).toBe('Upstream timed out');
    expect(error.isTimeout()).toBe(true);
  });
});

describe('mapTransportFailure', () => {
  it('should classify timeouts as 408', () => {
    const error = mapTransportFailure('The operation was aborted', true);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.statusCode).toBe(408);
    expect(error.message).toBe('Request timeout');
  });

  it('should classify other failures as status 0 with the transport text', () => {
    const error = mapTransportFailure('fetch failed: connect ECONNREFUSED 127.0.0.1:443', false);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.statusCode).toBe(0);
    expect(error.message).toBe('fetch failed: connect ECONNREFUSED 127.0.0.1:443');
  });
});
