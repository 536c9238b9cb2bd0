/**
 * Fields: typed, named members of a message with an optional default.
 *
 * @packageDocumentation
 */

import { createResourceNameError, failure, success, type IdlResult } from '../errors/index.js';
import { isValidFieldName, type NamingMode } from '../naming/index.js';
import {
  isScalarPrimitive,
  PRIMITIVE_VALUE_KINDS,
  renderType,
  typeEquals,
  type Type,
} from '../type-model/index.js';
import { fieldValuesEqual, parseValue, renderValue, type FieldValue } from '../values/index.js';

/**
 * A validated field declaration.
 */
export interface Field {
  readonly type: Type;
  readonly name: string;
  /** Parsed default, present only when the declaration carried one. */
  readonly defaultValue?: FieldValue;
}

/**
 * Options for field creation.
 */
export interface FieldOptions {
  /** Field-name grammar to apply. */
  readonly naming?: NamingMode;
}

/**
 * Creates a field, parsing its default literal against its type.
 *
 * @param type - The resolved field type.
 * @param name - The field name.
 * @param defaultLiteral - Optional default value literal.
 * @param options - Naming grammar.
 * @returns The field or the first failure.
 */
export function createField(
  type: Type,
  name: string,
  defaultLiteral?: string,
  options: FieldOptions = {}
): IdlResult<Field> {
  if (!isValidFieldName(name, options.naming)) {
    return failure(createResourceNameError(name, `the field name '${name}' is not valid`));
  }
  if (defaultLiteral === undefined) {
    return success({ type, name });
  }

  const defaultValue = parseValue(type, defaultLiteral);
  if (!defaultValue.success) {
    return defaultValue;
  }
  return success({ type, name, defaultValue: defaultValue.value });
}

/**
 * Renders a field as `<type> <name>` followed by its default, if any.
 * Defaults of non-array string fields are single-quoted.
 *
 * @param field - The field.
 * @returns The rendered declaration.
 */
export function renderField(field: Field): string {
  const declaration = `${renderType(field.type)} ${field.name}`;
  if (field.defaultValue === undefined) {
    return declaration;
  }
  if (
    isScalarPrimitive(field.type) &&
    PRIMITIVE_VALUE_KINDS[field.type.typeName].kind === 'string'
  ) {
    return `${declaration} '${renderValue(field.defaultValue)}'`;
  }
  return `${declaration} ${renderValue(field.defaultValue)}`;
}

/**
 * Structural equality of type, name and default value.
 */
export function fieldEquals(a: Field, b: Field): boolean {
  if (!typeEquals(a.type, b.type) || a.name !== b.name) {
    return false;
  }
  if (a.defaultValue === undefined || b.defaultValue === undefined) {
    return a.defaultValue === b.defaultValue;
  }
  return fieldValuesEqual(a.defaultValue, b.defaultValue);
}
