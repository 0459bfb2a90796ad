/**
 * Configuration module for starcat.toml parsing and validation.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  CatalogConfig,
  Config,
  DistanceConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
} from './types.js';
export {
  DEFAULT_CATALOG,
  DEFAULT_CONFIG,
  DEFAULT_DISTANCE,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { DEFAULT_CONFIG_FILE, loadConfig } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
