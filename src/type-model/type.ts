/**
 * Type: a BaseType plus array semantics.
 *
 * @packageDocumentation
 */

import { createFormatError, failure, success, type IdlResult } from '../errors/index.js';
import {
  formatBaseType,
  parseBaseType,
  parsePositiveInteger,
  renderBaseType,
  baseTypeEquals,
  type BaseType,
  type BoundedStringBaseType,
  type PrimitiveBaseType,
  type ResolveOptions,
} from './base-type.js';
import { ARRAY_UPPER_BOUND_TOKEN } from './constants.js';

/**
 * Array-size policy of a type.
 *
 * - `none`: not an array
 * - `dynamic`: any number of elements, including zero
 * - `fixed`: exactly `size` elements
 * - `upper-bounded`: at most `size` elements
 */
export type ArrayShape =
  | { readonly mode: 'none' }
  | { readonly mode: 'dynamic' }
  | { readonly mode: 'fixed'; readonly size: number }
  | { readonly mode: 'upper-bounded'; readonly size: number };

/**
 * A fully resolved type.
 */
export type Type = BaseType & { readonly array: ArrayShape };

/**
 * A non-array primitive type, the only kind a single literal parses into.
 */
export type ScalarPrimitiveType = (PrimitiveBaseType | BoundedStringBaseType) & {
  readonly array: { readonly mode: 'none' };
};

const NO_ARRAY: ArrayShape = { mode: 'none' };

function parseArrayShape(typeString: string, sizeSpec: string): IdlResult<ArrayShape> {
  if (sizeSpec === '') {
    return success({ mode: 'dynamic' });
  }

  const isUpperBound = sizeSpec.startsWith(ARRAY_UPPER_BOUND_TOKEN);
  const size = parsePositiveInteger(
    isUpperBound ? sizeSpec.slice(ARRAY_UPPER_BOUND_TOKEN.length) : sizeSpec
  );
  if (size === undefined) {
    return failure(
      createFormatError(
        typeString,
        `the size of array type '${typeString}' must be a valid integer value > 0 ` +
          `optionally prefixed with '${ARRAY_UPPER_BOUND_TOKEN}' if it is only an upper bound`
      )
    );
  }
  return success(isUpperBound ? { mode: 'upper-bounded', size } : { mode: 'fixed', size });
}

/**
 * Parses a type string, including an optional array suffix, into a Type.
 *
 * The array suffix is `[]` (dynamic), `[N]` (fixed) or `[<=N]`
 * (upper-bounded); the rest of the string resolves as in
 * {@link parseBaseType}.
 *
 * @param typeString - The type string.
 * @param options - Context for unqualified names and the naming grammar.
 * @returns The resolved Type or the error describing why it cannot be resolved.
 *
 * @example
 * ```typescript
 * const result = parseType('string<=10[<=5]');
 * if (result.success) {
 *   formatType(result.value); // 'string<=10[<=5]'
 * }
 * ```
 */
export function parseType(typeString: string, options: ResolveOptions = {}): IdlResult<Type> {
  let baseString = typeString;
  let array: ArrayShape = NO_ARRAY;

  if (typeString.endsWith(']')) {
    const open = typeString.lastIndexOf('[');
    if (open === -1) {
      return failure(
        createFormatError(typeString, `the type '${typeString}' ends with ']' but does not contain a '['`)
      );
    }
    const shape = parseArrayShape(typeString, typeString.slice(open + 1, -1));
    if (!shape.success) {
      return shape;
    }
    array = shape.value;
    baseString = typeString.slice(0, open);
  }

  const base = parseBaseType(baseString, options);
  if (!base.success) {
    return base;
  }
  return success({ ...base.value, array });
}

function renderArraySuffix(array: ArrayShape): string {
  switch (array.mode) {
    case 'none':
      return '';
    case 'dynamic':
      return '[]';
    case 'fixed':
      return `[${String(array.size)}]`;
    case 'upper-bounded':
      return `[${ARRAY_UPPER_BOUND_TOKEN}${String(array.size)}]`;
  }
}

/**
 * Renders a type in display form, e.g. `geometry/Point[<=3]`.
 *
 * @param type - The type.
 * @returns The display string.
 */
export function renderType(type: Type): string {
  return renderBaseType(type) + renderArraySuffix(type.array);
}

/**
 * Renders a type as the type string it was parsed from, e.g.
 * `geometry::msg::Point[<=3]`. Inverse of {@link parseType}.
 *
 * @param type - The type.
 * @returns The canonical type string.
 */
export function formatType(type: Type): string {
  return formatBaseType(type) + renderArraySuffix(type.array);
}

/**
 * Strips array-ness from a type.
 *
 * @param type - The type.
 * @returns Its base type, without the `array` property.
 */
export function toBaseType(type: Type): BaseType {
  switch (type.kind) {
    case 'primitive':
      return { kind: type.kind, typeName: type.typeName };
    case 'bounded-string':
      return { kind: type.kind, typeName: type.typeName, stringUpperBound: type.stringUpperBound };
    case 'namespaced':
      return {
        kind: type.kind,
        packageName: type.packageName,
        namespace: type.namespace,
        typeName: type.typeName,
      };
  }
}

/**
 * The element type of an array, or the type itself when it is no array.
 *
 * @param type - The type.
 * @returns The same type with array shape `none`.
 */
export function elementType(type: Type): Type {
  return { ...toBaseType(type), array: NO_ARRAY };
}

/**
 * Narrows a type to a non-array primitive.
 *
 * @param type - The type.
 * @returns Whether the type parses single literals.
 */
export function isScalarPrimitive(type: Type): type is ScalarPrimitiveType {
  return type.kind !== 'namespaced' && type.array.mode === 'none';
}

/** Whether the type is an array of any shape. */
export function isArray(type: Type): boolean {
  return type.array.mode !== 'none';
}

/**
 * Whether the type is an array whose length may vary: unsized or
 * upper-bounded.
 */
export function isDynamicArray(type: Type): boolean {
  return type.array.mode === 'dynamic' || type.array.mode === 'upper-bounded';
}

/** Whether the type is an array of exactly `size` elements. */
export function isFixedSizeArray(type: Type): boolean {
  return type.array.mode === 'fixed';
}

/** Whether the type is an array with a ceiling on its length. */
export function isUpperBoundArray(type: Type): boolean {
  return type.array.mode === 'upper-bounded';
}

/**
 * The declared size or ceiling of an array type.
 *
 * @param type - The type.
 * @returns The size, or undefined for non-arrays and dynamic arrays.
 */
export function arraySize(type: Type): number | undefined {
  return type.array.mode === 'fixed' || type.array.mode === 'upper-bounded'
    ? type.array.size
    : undefined;
}

/**
 * Structural equality of base identity and array shape.
 *
 * @param a - First type.
 * @param b - Second type.
 * @returns Whether both denote the same type.
 */
export function typeEquals(a: Type, b: Type): boolean {
  return (
    baseTypeEquals(a, b) && a.array.mode === b.array.mode && arraySize(a) === arraySize(b)
  );
}
