/**
 * Default configuration values for idl.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, NamingConfig } from './types.js';

/**
 * Default naming configuration: the strict grammars.
 */
export const DEFAULT_NAMING: NamingConfig = {
  mode: 'strict',
};

/**
 * Default logging configuration (debug disabled).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
  component: 'idl',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  naming: DEFAULT_NAMING,
  logging: DEFAULT_LOGGING,
};

/** Conventional configuration file name. */
export const DEFAULT_CONFIG_FILE = 'idl.toml';
