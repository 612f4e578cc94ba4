/**
 * Configuration Exports
 * =====================
 */

export type {
  ConfigOverrides,
  IacGenConfig,
  KnowledgeBaseConfig,
  LoadConfigOptions,
  ModelConfig,
} from './config.js';

export {
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  collectConfigIssues,
  loadConfig,
  mergeConfig,
  overridesFromEnv,
  overridesFromJson,
  sessionConfigOf,
  validateConfig,
} from './config.js';
