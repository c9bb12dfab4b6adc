export {
  ConfigError,
  defaultConfigPaths,
  parseConfig,
  loadConfig,
  findRegistry,
  getDefaultRegistry,
  splitUserInfo,
  resolveRegistryConnection,
  resolveWorkerCount,
} from './registry';
export type {
  RegistryEntry,
  AppConfig,
  RegistryConnection,
  ConnectionFlags,
  Env,
} from './registry';
