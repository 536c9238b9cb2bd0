/**
 * Configuration module for idl.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, loadConfig, parseConfig } from './parser.js';
export type { Config, LoggingConfig, NamingConfig, PartialConfig } from './types.js';
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, DEFAULT_LOGGING, DEFAULT_NAMING } from './defaults.js';
export {
  applyEnvOverrides,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
