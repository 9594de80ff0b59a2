export { loadConfig, configFromEnv, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export { UserConfigSchema, ProviderNameSchema, type ValidatedUserConfig, type ProviderName } from './schema.js';
