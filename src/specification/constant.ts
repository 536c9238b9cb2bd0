/**
 * Constants: named primitive values declared by a message.
 *
 * @packageDocumentation
 */

import {
  createResourceNameError,
  createSpecificationError,
  failure,
  success,
  type IdlResult,
} from '../errors/index.js';
import { isValidConstantName } from '../naming/index.js';
import {
  isPrimitiveTypeName,
  PRIMITIVE_VALUE_KINDS,
  type PrimitiveTypeName,
} from '../type-model/index.js';
import { parsePrimitiveValue, type PrimitiveValue } from '../values/index.js';

/**
 * A validated constant declaration.
 */
export interface Constant {
  readonly type: PrimitiveTypeName;
  readonly name: string;
  readonly value: PrimitiveValue;
}

/**
 * Creates a constant from its raw declaration parts.
 *
 * The type must be a plain primitive name (no arrays, bounds or message
 * references) and the name must be upper snake case.
 *
 * @param typeName - The primitive type name.
 * @param name - The constant name.
 * @param valueLiteral - The value literal.
 * @returns The constant or the first failure.
 *
 * @example
 * ```typescript
 * createConstant('int32', 'MAX_SPEED', '100');
 * // { success: true, value: { type: 'int32', name: 'MAX_SPEED', value: 100 } }
 * ```
 */
export function createConstant(
  typeName: string,
  name: string,
  valueLiteral: string
): IdlResult<Constant> {
  if (!isPrimitiveTypeName(typeName)) {
    return failure(
      createSpecificationError(
        'invalid_constant_type',
        `the constant type '${typeName}' must be a primitive type`,
        [typeName]
      )
    );
  }
  if (!isValidConstantName(name)) {
    return failure(createResourceNameError(name, `the constant name '${name}' is not valid`));
  }

  const value = parsePrimitiveValue({ kind: 'primitive', typeName, array: { mode: 'none' } }, valueLiteral);
  if (!value.success) {
    return value;
  }
  return success({ type: typeName, name, value: value.value });
}

/**
 * Renders a constant as `<type> <NAME>=<value>`, single-quoting string values.
 *
 * @param constant - The constant.
 * @returns The rendered declaration.
 */
export function renderConstant(constant: Constant): string {
  const value =
    PRIMITIVE_VALUE_KINDS[constant.type].kind === 'string'
      ? `'${String(constant.value)}'`
      : String(constant.value);
  return `${constant.type} ${constant.name}=${value}`;
}

/**
 * Structural equality of type, name and value.
 */
export function constantEquals(a: Constant, b: Constant): boolean {
  return a.type === b.type && a.name === b.name && Object.is(a.value, b.value);
}
