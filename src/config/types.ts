/**
 * Configuration types for idl.toml parsing.
 *
 * @packageDocumentation
 */

import type { NamingMode } from '../naming/index.js';

/**
 * Identifier grammar settings.
 */
export interface NamingConfig {
  /** `strict` (default) or `relaxed` field and message names. */
  mode: NamingMode;
}

/**
 * Structured logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
  /** Component name stamped on every log entry. */
  component: string;
}

/**
 * Complete configuration.
 */
export interface Config {
  naming: NamingConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every section and key optional, as read from the
 * environment.
 */
export interface PartialConfig {
  naming?: Partial<NamingConfig>;
  logging?: Partial<LoggingConfig>;
}
