/**
 * Type resolution: primitive table, BaseType and Type parsing, rendering and
 * structural identity.
 *
 * @packageDocumentation
 */

export {
  ARRAY_UPPER_BOUND_TOKEN,
  DISPLAY_SEPARATOR,
  NAMESPACE_SEPARATOR,
  STRING_UPPER_BOUND_TOKEN,
} from './constants.js';
export { isPrimitiveTypeName, PRIMITIVE_TYPES, PRIMITIVE_VALUE_KINDS } from './primitives.js';
export type { IntegerWidth, PrimitiveTypeName, PrimitiveValueKind } from './primitives.js';
export {
  baseTypeEquals,
  baseTypeKey,
  BaseTypeSet,
  formatBaseType,
  isPrimitive,
  parseBaseType,
  parsePositiveInteger,
  renderBaseType,
} from './base-type.js';
export type {
  BaseType,
  BoundedStringBaseType,
  NamespacedBaseType,
  PrimitiveBaseType,
  ResolveOptions,
} from './base-type.js';
export {
  arraySize,
  elementType,
  formatType,
  isArray,
  isDynamicArray,
  isFixedSizeArray,
  isScalarPrimitive,
  isUpperBoundArray,
  parseType,
  renderType,
  toBaseType,
  typeEquals,
} from './type.js';
export type { ArrayShape, ScalarPrimitiveType, Type } from './type.js';
