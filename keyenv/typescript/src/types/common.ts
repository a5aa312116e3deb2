import { z } from 'zod';
import type { ApiError } from '../errors/error.js';
import { InvalidResponseError } from '../errors/categories.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Decoded JSON object with unknown members
 */
export type JsonObject = Record<string, unknown>;

/**
 * Outcome of a request: the decoded value or the classified failure
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ApiError };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Single-record endpoints answer either `{ [wrapperKey]: {...} }` or the
 * record fields at the root. Returns the record in both cases.
 */
export function unwrapRecord(payload: unknown, wrapperKey: string): unknown {
  if (isJsonObject(payload)) {
    const wrapped = payload[wrapperKey];
    if (wrapped !== undefined && wrapped !== null) {
      return wrapped;
    }
  }
  return payload;
}

/** Ids may arrive as numbers; records always hold strings. */
export const identifierSchema = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value));

/** Opaque optional string; `null` on the wire means absent. */
export const optionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/** Raw object payloads the client hands back undecoded. */
export const jsonObjectSchema: z.ZodType<JsonObject, z.ZodTypeDef, unknown> = z.record(z.unknown());

/** Server-assigned integer version; numeric strings are accepted. */
export const versionSchema = z.union([
  z.number().int(),
  z.string().regex(/^\d+$/).transform((value) => Number(value)),
]);

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Validates a decoded payload, raising InvalidResponseError with the
 * failing paths when it does not match
 */
export function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  statusCode = 200
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new InvalidResponseError(
      statusCode,
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}
