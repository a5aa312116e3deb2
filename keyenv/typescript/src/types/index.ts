export {
  type HttpMethod,
  type JsonObject,
  type Result,
  isJsonObject,
  unwrapRecord,
  decodeWith,
  jsonObjectSchema,
} from './common.js';
export {
  type Secret,
  type SecretWithValue,
  type SecretWire,
  type SecretWithValueWire,
  secretSchema,
  secretWithValueSchema,
  secretResponseSchema,
  secretWithValueResponseSchema,
  secretListResponseSchema,
  secretWithValueListResponseSchema,
  secretFromResponse,
  secretWithValueFromResponse,
  secretToWire,
  secretWithValueToWire,
} from './secret.js';
export {
  type Environment,
  type EnvironmentWire,
  environmentSchema,
  environmentListResponseSchema,
  environmentFromResponse,
  environmentToWire,
} from './environment.js';
