/**
 * @fileoverview Public API for configuration
 * @module config
 */

export {
  // Schemas
  GlobalConfigSchema,
  ProjectConfigSchema,
  CredentialsConfigSchema,
  ApiConfigSchema,
  GenerationConfigSchema,
  LogLevelNameSchema,
  // Types
  type QuickstartConfig,
  type ProjectConfig,
  type CredentialsConfig,
  type ApiConfig,
  type GenerationDefaults,
} from './schemas.js';

export { ConfigError } from './errors.js';

export {
  HOME_ENV_VAR,
  MODEL_ENV_VAR,
  LOG_LEVEL_ENV_VAR,
  // Path utilities
  getConfigDir,
  getGlobalConfigPath,
  getProjectConfigPath,
  // Loaders
  loadGlobalConfig,
  loadProjectConfig,
  loadConfig,
  // Initialization
  ensureConfigDir,
  createDefaultConfig,
} from './loader.js';
