/**
 * Value parsing: primitive literals, string-array tokenizing and array
 * literals.
 *
 * @packageDocumentation
 */

export { fieldValuesEqual, integerBounds, parsePrimitiveValue, renderValue } from './primitive.js';
export type { FieldValue, PrimitiveValue } from './primitive.js';
export { tokenizeStringArray } from './tokenizer.js';
export { parseArrayValue, parseValue } from './array.js';
