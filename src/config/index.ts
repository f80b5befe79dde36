/**
 * Configuration module for eqp-spec.toml parsing and validation.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  loadConfigFile,
  mergeConfig,
  parseConfig,
} from './parser.js';
export type {
  Config,
  LoggingSettings,
  PartialConfig,
  ServerSettings,
  StorageSettings,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_SERVER,
  DEFAULT_STORAGE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  EnvOverridesError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
