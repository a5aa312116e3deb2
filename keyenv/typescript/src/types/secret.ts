/**
 * Secret records and their wire (snake_case) representation.
 * @module types/secret
 */

import { z } from 'zod';
import {
  decodeWith,
  identifierSchema,
  optionalTextSchema,
  unwrapRecord,
  versionSchema,
  type Mutable,
} from './common.js';

/**
 * A secret without its decrypted value
 */
export interface Secret {
  readonly id: string;
  readonly environmentId: string;
  /** Variable name, unique within an environment */
  readonly key: string;
  readonly type: string;
  readonly version: number;
  readonly description?: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
}

/**
 * A secret with its decrypted value
 */
export interface SecretWithValue extends Secret {
  readonly value: string;
  /** Environment the value is inherited from; absent when defined locally */
  readonly inheritedFrom?: string;
}

export interface SecretWire {
  id: string;
  environment_id: string;
  key: string;
  type: string;
  version: number;
  description?: string;
  created_at?: string;
  updated_at?: string;
}

export interface SecretWithValueWire extends SecretWire {
  value: string;
  inherited_from?: string;
}

const secretFields = z.object({
  id: identifierSchema,
  environment_id: identifierSchema,
  key: z.string().min(1),
  type: z.string().nullish().transform((value) => value ?? 'string'),
  version: versionSchema,
  description: optionalTextSchema,
  created_at: optionalTextSchema,
  updated_at: optionalTextSchema,
});

const secretWithValueFields = secretFields.extend({
  value: z.string().nullish().transform((value) => value ?? ''),
  inherited_from: optionalTextSchema,
});

function buildSecret(wire: z.output<typeof secretFields>): Mutable<Secret> {
  const secret: Mutable<Secret> = {
    id: wire.id,
    environmentId: wire.environment_id,
    key: wire.key,
    type: wire.type,
    version: wire.version,
  };
  if (wire.description !== undefined) secret.description = wire.description;
  if (wire.created_at !== undefined) secret.createdAt = wire.created_at;
  if (wire.updated_at !== undefined) secret.updatedAt = wire.updated_at;
  return secret;
}

export const secretSchema = secretFields.transform((wire): Secret => Object.freeze(buildSecret(wire)));

export const secretWithValueSchema = secretWithValueFields.transform((wire): SecretWithValue => {
  const secret: Mutable<SecretWithValue> = { ...buildSecret(wire), value: wire.value };
  if (wire.inherited_from !== undefined) secret.inheritedFrom = wire.inherited_from;
  return Object.freeze(secret);
});

/** `{ secret: {...} }` or the bare record */
export const secretResponseSchema = z.preprocess(
  (payload) => unwrapRecord(payload, 'secret'),
  secretSchema
);

/** `{ secret: {...} }` or the bare record */
export const secretWithValueResponseSchema = z.preprocess(
  (payload) => unwrapRecord(payload, 'secret'),
  secretWithValueSchema
);

export const secretListResponseSchema = z
  .object({ secrets: z.array(secretSchema).nullish() })
  .transform((response) => response.secrets ?? []);

export const secretWithValueListResponseSchema = z
  .object({ secrets: z.array(secretWithValueSchema).nullish() })
  .transform((response) => response.secrets ?? []);

export function secretFromResponse(data: unknown): Secret {
  return decodeWith(secretSchema, data);
}

export function secretWithValueFromResponse(data: unknown): SecretWithValue {
  return decodeWith(secretWithValueSchema, data);
}

export function secretToWire(secret: Secret): SecretWire {
  const wire: SecretWire = {
    id: secret.id,
    environment_id: secret.environmentId,
    key: secret.key,
    type: secret.type,
    version: secret.version,
  };
  if (secret.description !== undefined) wire.description = secret.description;
  if (secret.createdAt !== undefined) wire.created_at = secret.createdAt;
  if (secret.updatedAt !== undefined) wire.updated_at = secret.updatedAt;
  return wire;
}

export function secretWithValueToWire(secret: SecretWithValue): SecretWithValueWire {
  const wire: SecretWithValueWire = { ...secretToWire(secret), value: secret.value };
  if (secret.inheritedFrom !== undefined) wire.inherited_from = secret.inheritedFrom;
  return wire;
}
