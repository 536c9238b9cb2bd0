/**
 * Parsing of default and constant literals against any value-bearing type,
 * including arrays.
 *
 * @packageDocumentation
 */

import {
  createFormatError,
  createInvalidValueError,
  failure,
  success,
  type IdlResult,
} from '../errors/index.js';
import {
  elementType,
  isScalarPrimitive,
  PRIMITIVE_VALUE_KINDS,
  renderType,
  type Type,
} from '../type-model/index.js';
import { parsePrimitiveValue, type FieldValue, type PrimitiveValue } from './primitive.js';
import { tokenizeStringArray } from './tokenizer.js';

function unsupported(type: Type, literal: string): IdlResult<never> {
  const rendered = renderType(type);
  return failure(
    createInvalidValueError(
      rendered,
      literal,
      `parsing string values into type '${rendered}' is not supported`
    )
  );
}

/**
 * Checks an element count against the array-size policy of a type.
 *
 * @param type - The array type.
 * @param literal - The whole array literal, for the error.
 * @param count - Number of elements found.
 * @returns Undefined when the count is acceptable, otherwise the failure.
 */
function checkElementCount(type: Type, literal: string, count: number): IdlResult<never> | undefined {
  const { array } = type;
  if (array.mode === 'fixed' && count !== array.size) {
    return failure(
      createInvalidValueError(
        renderType(type),
        literal,
        `array must have exactly ${String(array.size)} elements, not ${String(count)}`
      )
    );
  }
  if (array.mode === 'upper-bounded' && count > array.size) {
    return failure(
      createInvalidValueError(
        renderType(type),
        literal,
        `array must have not more than ${String(array.size)} elements, not ${String(count)}`
      )
    );
  }
  return undefined;
}

/**
 * Parses an array literal `[e0, e1, ...]` against an array of primitives.
 *
 * String arrays are split with {@link tokenizeStringArray}; other element
 * types split on every comma. The element count is checked before any
 * element is parsed.
 *
 * @param type - The array type.
 * @param literal - The literal including its brackets.
 * @returns The parsed elements or the first failure.
 */
export function parseArrayValue(type: Type, literal: string): IdlResult<PrimitiveValue[]> {
  const element = elementType(type);
  if (type.array.mode === 'none' || !isScalarPrimitive(element)) {
    return unsupported(type, literal);
  }

  if (!literal.startsWith('[') || !literal.endsWith(']')) {
    return failure(
      createFormatError(
        literal,
        `value '${literal}' can not be converted to type '${renderType(type)}': ` +
          "array value must start with '[' and end with ']'"
      )
    );
  }
  const interior = literal.slice(1, -1);

  let elementLiterals: string[];
  if (PRIMITIVE_VALUE_KINDS[element.typeName].kind === 'string') {
    const tokens = tokenizeStringArray(interior);
    if (!tokens.success) {
      return tokens;
    }
    elementLiterals = tokens.value;
  } else {
    elementLiterals = interior === '' ? [] : interior.split(',');
  }

  const countFailure = checkElementCount(type, literal, elementLiterals.length);
  if (countFailure !== undefined) {
    return countFailure;
  }

  const values: PrimitiveValue[] = [];
  for (const [index, elementLiteral] of elementLiterals.entries()) {
    const parsed = parsePrimitiveValue(element, elementLiteral.trim());
    if (!parsed.success) {
      return failure(
        createInvalidValueError(
          renderType(type),
          literal,
          `element ${String(index)} with ${parsed.error.message}`,
          { elementIndex: index, cause: parsed.error }
        )
      );
    }
    values.push(parsed.value);
  }
  return success(values);
}

/**
 * Parses a literal against a type: a single primitive, or an array of
 * primitives. Message-typed values have no literal form.
 *
 * @param type - The target type.
 * @param literal - The literal text.
 * @returns The parsed value or the failure.
 *
 * @example
 * ```typescript
 * const type = unwrapResult(parseType('int32[<=3]'));
 * parseValue(type, '[1, 2]'); // { success: true, value: [1, 2] }
 * ```
 */
export function parseValue(type: Type, literal: string): IdlResult<FieldValue> {
  if (isScalarPrimitive(type)) {
    return parsePrimitiveValue(type, literal);
  }
  if (type.kind === 'namespaced') {
    return unsupported(type, literal);
  }
  return parseArrayValue(type, literal);
}
