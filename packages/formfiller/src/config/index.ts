export { getEnv, resetEnv, type Env } from './env.js';
export {
  ConfigurationBuilder,
  parseConfig,
  formFillingConfigSchema,
  type FormFillingConfig,
  type FormFillingConfigInput,
  type LlmConfig,
  type LoggingConfig,
  type CacheConfig,
} from './configuration.js';
export { loadProviderCatalog, getProviderEntry, type ProviderEntry, type ProviderKind, type ProviderCatalog } from './providers.js';
export * from './constants.js';
