/**
 * Environment records.
 * @module types/environment
 */

import { z } from 'zod';
import { decodeWith, identifierSchema, optionalTextSchema, type Mutable } from './common.js';

/**
 * A deployment context within a project
 */
export interface Environment {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  /** Parent environment consulted for values not defined here */
  readonly inheritsFrom?: string;
  readonly createdAt?: string;
}

export interface EnvironmentWire {
  id: string;
  project_id: string;
  name: string;
  inherits_from?: string;
  created_at?: string;
}

export const environmentSchema = z
  .object({
    id: identifierSchema,
    project_id: identifierSchema,
    name: z.string().min(1),
    inherits_from: optionalTextSchema,
    created_at: optionalTextSchema,
  })
  .transform((wire): Environment => {
    const environment: Mutable<Environment> = {
      id: wire.id,
      projectId: wire.project_id,
      name: wire.name,
    };
    if (wire.inherits_from !== undefined) environment.inheritsFrom = wire.inherits_from;
    if (wire.created_at !== undefined) environment.createdAt = wire.created_at;
    return Object.freeze(environment);
  });

export const environmentListResponseSchema = z
  .object({ environments: z.array(environmentSchema).nullish() })
  .transform((response) => response.environments ?? []);

export function environmentFromResponse(data: unknown): Environment {
  return decodeWith(environmentSchema, data);
}

export function environmentToWire(environment: Environment): EnvironmentWire {
  const wire: EnvironmentWire = {
    id: environment.id,
    project_id: environment.projectId,
    name: environment.name,
  };
  if (environment.inheritsFrom !== undefined) wire.inherits_from = environment.inheritsFrom;
  if (environment.createdAt !== undefined) wire.created_at = environment.createdAt;
  return wire;
}
