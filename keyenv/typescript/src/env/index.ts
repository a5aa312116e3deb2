export {
  type EnvFileEntry,
  formatEnvLine,
  formatGeneratedAt,
  serializeEnvFile,
} from './serializer.js';
export {
  type EnvironmentStore,
  ProcessEnvironmentStore,
  InMemoryEnvironmentStore,
} from './store.js';
