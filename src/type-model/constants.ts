/**
 * Tokens of the type-string grammar.
 *
 * @packageDocumentation
 */

/** Separates package, namespace and type name in a qualified type string. */
export const NAMESPACE_SEPARATOR = '::';

/** Separates package and type name in the display form of a type. */
export const DISPLAY_SEPARATOR = '/';

/** Marks an array size as a ceiling rather than an exact count. */
export const ARRAY_UPPER_BOUND_TOKEN = '<=';

/** Introduces the length ceiling of a bounded string. */
export const STRING_UPPER_BOUND_TOKEN = '<=';
