/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `zctx config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  EmbeddingProviderSchema,
  RetrievalConfigSchema,
  ContextConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, EmbeddingProviderName } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE, DEFAULT_CONTEXT_HEADER } from './defaults.js';

// Loader functions
export {
  loadConfig,
  mergeConfig,
  getConfigValue,
  setConfigValue,
  isConfigKey,
  listConfig,
  resetConfig,
  ensureDataDir,
} from './loader.js';

// Paths
export { getDataDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  apiKeyEnvVar,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  DEFAULT_OLLAMA_HOST,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
