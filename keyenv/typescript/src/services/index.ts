export {
  type SecretsService,
  type SecretsServiceOptions,
  type SecretWriteRequest,
  SecretsServiceImpl,
  createSecretsService,
} from './secrets/index.js';
export {
  type EnvironmentsService,
  EnvironmentsServiceImpl,
  createEnvironmentsService,
} from './environments/index.js';
export {
  type AccountService,
  AccountServiceImpl,
  createAccountService,
} from './account/index.js';
export { environmentsPath, secretsPath, secretsExportPath } from './paths.js';
