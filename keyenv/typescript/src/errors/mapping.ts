import { z } from 'zod';
import { ApiError } from './error.js';
import {
  AuthenticationError,
  NetworkError,
  NotFoundError,
  TimeoutError,
} from './categories.js';

const errorBodySchema = z.object({
  error: z.string().optional().catch(undefined),
  code: z.string().optional().catch(undefined),
  details: z.record(z.unknown()).optional().catch(undefined),
});

/**
 * Builds the error for an HTTP status >= 400 from its decoded body.
 * Fields of the wrong type are treated as absent.
 */
export function mapHttpError(status: number, body: unknown): ApiError {
  const parsed = errorBodySchema.safeParse(body);
  const errorBody: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};

  const message = errorBody.error ?? 'Unknown error';
  const code = errorBody.code;
  const details = errorBody.details ?? {};

  switch (status) {
    case 401: return new AuthenticationError(message, code, details);
    case 404: return new NotFoundError(message, code, details);
    case 408: return new TimeoutError(message, code, details);
    default: return new ApiError({ message, statusCode: status, errorCode: code, details });
  }
}

/**
 * Builds the error for a request that produced no HTTP response
 */
export function mapTransportFailure(message: string, timedOut: boolean, cause?: unknown): ApiError {
  if (timedOut) {
    return new TimeoutError();
  }
  return new NetworkError(message, cause);
}
