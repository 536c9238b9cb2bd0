/**
 * Environment variable overrides for configuration.
 *
 * IDL_* environment variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isNamingMode, NAMING_MODES, type NamingMode } from '../naming/index.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts `true`, `1`, `yes`, `on` and `false`, `0`, `no`, `off`,
 * case-insensitively.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

function coerceToNamingMode(value: string, envVar: string): NamingMode {
  const trimmed = value.trim().toLowerCase();
  if (isNamingMode(trimmed)) {
    return trimmed;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'naming mode',
    `Cannot coerce '${envVar}' value '${value}' to naming mode. Expected one of: ${NAMING_MODES.join(', ')}`
  );
}

interface EnvVarMapping {
  readonly description: string;
  readonly type: 'string' | 'boolean' | 'naming mode';
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Format: IDL_<SECTION>_<FIELD> maps to config.<section>.<field>. Shortcuts
 * come first so the full path wins when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  IDL_DEBUG: {
    description: 'Enable debug logging (shortcut for IDL_LOGGING_DEBUG)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
  IDL_NAMING_MODE: {
    description: 'Identifier grammar: strict or relaxed',
    type: 'naming mode',
    apply: (overrides, value, envVar) => {
      overrides.naming = { ...overrides.naming, mode: coerceToNamingMode(value, envVar) };
    },
  },
  IDL_LOGGING_DEBUG: {
    description: 'Enable or disable debug logging (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
  IDL_LOGGING_COMPONENT: {
    description: 'Component name stamped on log entries',
    type: 'string',
    apply: (overrides, value) => {
      overrides.logging = { ...overrides.logging, component: value };
    },
  },
};

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads IDL_* environment variables and returns configuration overrides.
 *
 * Empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Overrides, applied variable names and collected errors.
 * @throws EnvCoercionError if a value cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ IDL_NAMING_MODE: 'relaxed' });
 * console.log(result.overrides.naming?.mode); // "relaxed"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    naming: { ...base.naming, ...partial.naming },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
