/**
 * Configuration & Environment
 */

export {
  Config,
  ConfigError,
  ConfigSchema,
  DEFAULT_CONFIG,
  configFromEnv,
  loadConfig,
  type ConfigOptions,
} from './config.ts';
