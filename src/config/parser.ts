/**
 * TOML configuration parser for idl.toml.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import { isNamingMode, NAMING_MODES } from '../naming/index.js';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_NAMING } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import type { Config, LoggingConfig, NamingConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a section is a TOML table.
 *
 * @param value - Value to validate.
 * @param section - Section name for error messages.
 * @returns The table, or undefined when the section is absent.
 * @throws ConfigParseError if the value is not a table.
 */
function validateSection(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${section}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function parseNaming(raw: Record<string, unknown> | undefined): NamingConfig {
  const result: NamingConfig = { ...DEFAULT_NAMING };
  if (raw === undefined) {
    return result;
  }

  if ('mode' in raw) {
    const mode = validateString(raw.mode, 'naming.mode');
    if (!isNamingMode(mode)) {
      throw new ConfigParseError(
        `Invalid value for 'naming.mode': expected one of [${NAMING_MODES.join(', ')}], got '${mode}'`
      );
    }
    result.mode = mode;
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  if ('component' in raw) {
    const component = validateString(raw.component, 'logging.component');
    if (component.trim() === '') {
      throw new ConfigParseError(`Invalid value for 'logging.component': must not be empty`);
    }
    result.component = component;
  }

  return result;
}

/**
 * Parses idl.toml content into a complete configuration.
 *
 * Absent sections and keys take their defaults; unknown keys are ignored.
 *
 * @param tomlContent - The TOML text.
 * @returns The configuration.
 * @throws ConfigParseError on invalid TOML, wrong value types or unknown naming modes.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [naming]
 * mode = "relaxed"
 * `);
 * console.log(config.naming.mode); // "relaxed"
 * console.log(config.logging.debug); // false
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    naming: parseNaming(validateSection(parsed.naming, 'naming')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    naming: { ...DEFAULT_CONFIG.naming },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Loads configuration from a file and applies environment overrides.
 *
 * Override precedence: env > config file > defaults. A missing file yields
 * the defaults.
 *
 * @param filePath - Path to idl.toml.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @returns The effective configuration.
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws EnvCoercionError if an environment override has an invalid value.
 */
export async function loadConfig(filePath: string, env?: EnvRecord): Promise<Config> {
  let content: string | undefined;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Cannot read configuration file '${filePath}': ${cause.message}`, cause);
    }
  }

  const config = content === undefined ? getDefaultConfig() : parseConfig(content);
  return env === undefined ? applyEnvOverrides(config) : applyEnvOverrides(config, env);
}
