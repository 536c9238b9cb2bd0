/**
 * Identifier grammars for packages, fields, messages and constants.
 *
 * Every predicate matches the entire string. Two grammars exist: `strict`
 * (the default) and `relaxed`, which accepts the mixed-case field and
 * message names found in older message sets. Package and constant names use
 * the same grammar in both modes.
 *
 * @packageDocumentation
 */

/**
 * Which identifier grammar to apply.
 */
export type NamingMode = 'strict' | 'relaxed';

/** Valid naming modes. */
export const NAMING_MODES: readonly NamingMode[] = ['strict', 'relaxed'];

/**
 * Lowercase letters and digits with single underscores between them, starting
 * with a letter. Same language as `^[a-z]([a-z0-9_]?[a-z0-9]+)*$`.
 */
const PACKAGE_NAME_PATTERN = /^[a-z](?:_?[a-z0-9])*$/;

const FIELD_NAME_PATTERNS: Readonly<Record<NamingMode, RegExp>> = {
  strict: /^[a-z](?:_?[a-z0-9])*$/,
  relaxed: /^[A-Za-z][A-Za-z0-9_]*$/,
};

const MESSAGE_NAME_PATTERNS: Readonly<Record<NamingMode, RegExp>> = {
  strict: /^[A-Z][A-Za-z0-9]*$/,
  relaxed: /^[A-Za-z][A-Za-z0-9]*$/,
};

/** Upper-case counterpart of the package grammar. */
const CONSTANT_NAME_PATTERN = /^[A-Z](?:_?[A-Z0-9])*$/;

/** Prefix carried by generated sample wrapper messages. */
export const SAMPLE_MESSAGE_PREFIX = 'Sample_';

/** Suffix of the generated request message of a service. */
export const SERVICE_REQUEST_MESSAGE_SUFFIX = '_Request';

/** Suffix of the generated response message of a service. */
export const SERVICE_RESPONSE_MESSAGE_SUFFIX = '_Response';

/**
 * Checks whether a string is a valid package name.
 *
 * @param name - Candidate package name.
 * @returns Whether the name matches the package grammar.
 */
export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME_PATTERN.test(name);
}

/**
 * Checks whether a string is a valid field name.
 *
 * @param name - Candidate field name.
 * @param mode - Naming grammar to apply.
 * @returns Whether the name matches the field grammar.
 */
export function isValidFieldName(name: string, mode: NamingMode = 'strict'): boolean {
  return FIELD_NAME_PATTERNS[mode].test(name);
}

/**
 * Checks whether a string is a valid message name.
 *
 * A leading `Sample_` prefix and at most one trailing `_Request` or
 * `_Response` suffix are removed before matching, so the names of generated
 * wrapper messages validate against their base name.
 *
 * @param name - Candidate message name.
 * @param mode - Naming grammar to apply.
 * @returns Whether the name matches the message grammar.
 *
 * @example
 * ```typescript
 * isValidMessageName('AddTwoInts_Request'); // true
 * isValidMessageName('point'); // false
 * ```
 */
export function isValidMessageName(name: string, mode: NamingMode = 'strict'): boolean {
  let stripped = name;
  if (stripped.startsWith(SAMPLE_MESSAGE_PREFIX)) {
    stripped = stripped.slice(SAMPLE_MESSAGE_PREFIX.length);
  }
  for (const suffix of [SERVICE_REQUEST_MESSAGE_SUFFIX, SERVICE_RESPONSE_MESSAGE_SUFFIX]) {
    if (stripped.endsWith(suffix)) {
      stripped = stripped.slice(0, -suffix.length);
      break;
    }
  }
  return MESSAGE_NAME_PATTERNS[mode].test(stripped);
}

/**
 * Checks whether a string is a valid constant name.
 *
 * @param name - Candidate constant name.
 * @returns Whether the name matches the constant grammar.
 */
export function isValidConstantName(name: string): boolean {
  return CONSTANT_NAME_PATTERN.test(name);
}

/**
 * Type guard for naming mode strings read from configuration.
 *
 * @param value - The string to check.
 * @returns Whether the value is a NamingMode.
 */
export function isNamingMode(value: string): value is NamingMode {
  return value === 'strict' || value === 'relaxed';
}
