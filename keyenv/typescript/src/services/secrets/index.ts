// Service
export type { SecretsService, SecretsServiceOptions } from './service.js';
export { SecretsServiceImpl, createSecretsService } from './service.js';

// Types
export type { SecretWriteRequest } from './types.js';
