/**
 * Parsing of single literals into primitive values.
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
  PRIMITIVE_VALUE_KINDS,
  renderBaseType,
  type IntegerWidth,
  type ScalarPrimitiveType,
} from '../type-model/index.js';

/**
 * A parsed primitive literal. 64-bit integers are bigints, narrower
 * integers and floats are numbers.
 */
export type PrimitiveValue = boolean | number | bigint | string;

/**
 * A parsed field default or constant value.
 */
export type FieldValue = PrimitiveValue | readonly PrimitiveValue[];

const TRUE_LITERALS = ['true', '1'];
const FALSE_LITERALS = ['false', '0'];

const INTEGER_PATTERN = /^[+-]?[0-9]+(?:_[0-9]+)*$/;
const FLOAT_PATTERN = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

const QUOTES = ['"', "'"] as const;
type Quote = (typeof QUOTES)[number];

const UNESCAPED_QUOTE: Readonly<Record<Quote, RegExp>> = {
  '"': /(?<!\\)"/,
  "'": /(?<!\\)'/,
};

/**
 * Inclusive bounds of an integer width.
 *
 * @param bits - Width in bits.
 * @param signed - Whether the type is two's-complement signed.
 * @returns The lowest and highest representable value.
 */
export function integerBounds(bits: IntegerWidth, signed: boolean): { lower: bigint; upper: bigint } {
  if (signed) {
    const half = 2n ** BigInt(bits - 1);
    return { lower: -half, upper: half - 1n };
  }
  return { lower: 0n, upper: 2n ** BigInt(bits) - 1n };
}

function parseIntegerLiteral(literal: string): bigint | undefined {
  const text = literal.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const digits = text.replaceAll('_', '');
  return BigInt(digits.startsWith('+') ? digits.slice(1) : digits);
}

function parseFloatLiteral(literal: string): number | undefined {
  const text = literal.trim();
  if (FLOAT_PATTERN.test(text)) {
    return Number(text);
  }
  const special = FLOAT_SPECIAL_PATTERN.exec(text);
  if (special === null) {
    return undefined;
  }
  const sign = special[1] === '-' ? -1 : 1;
  return special[2]?.toLowerCase() === 'nan' ? Number.NaN : sign * Number.POSITIVE_INFINITY;
}

function parseStringValue(type: ScalarPrimitiveType, literal: string): IdlResult<string> {
  let value = literal;
  for (const quote of QUOTES) {
    if (value.startsWith(quote) && value.endsWith(quote)) {
      value = value.slice(1, -1);
      if (UNESCAPED_QUOTE[quote].test(value)) {
        return failure(
          createFormatError(
            literal,
            `value '${literal}' can not be converted to type '${type.typeName}': ` +
              'string inner quotes not properly escaped'
          )
        );
      }
      value = value.replaceAll(`\\${quote}`, quote);
      break;
    }
  }

  if (type.kind === 'bounded-string' && [...value].length > type.stringUpperBound) {
    return failure(
      createInvalidValueError(
        renderBaseType(type),
        literal,
        `string must not exceed the maximum length of ${String(type.stringUpperBound)} characters`
      )
    );
  }

  return success(value);
}

/**
 * Parses a literal against a non-array primitive type.
 *
 * - boolean types accept `true`/`1` and `false`/`0`, case-insensitively
 * - integer types accept decimal integers within the width's range
 * - float types accept decimal floats using `.` as the separator
 * - string types strip one pair of matching outer quotes, require inner
 *   occurrences of that quote to be escaped, and unescape them
 *
 * @param type - The scalar primitive type.
 * @param literal - The literal text.
 * @returns The parsed value, or an InvalidValueError / FormatError.
 *
 * @example
 * ```typescript
 * parsePrimitiveValue(int8, '127'); // { success: true, value: 127 }
 * parsePrimitiveValue(int8, '128'); // InvalidValueError: must be a valid integer value >= -128 and <= 127
 * ```
 */
export function parsePrimitiveValue(
  type: ScalarPrimitiveType,
  literal: string
): IdlResult<PrimitiveValue> {
  const valueKind = PRIMITIVE_VALUE_KINDS[type.typeName];

  switch (valueKind.kind) {
    case 'boolean': {
      const lowered = literal.toLowerCase();
      if (TRUE_LITERALS.includes(lowered)) {
        return success(true);
      }
      if (FALSE_LITERALS.includes(lowered)) {
        return success(false);
      }
      return failure(
        createInvalidValueError(type.typeName, literal, "must be either 'true' / '1' or 'false' / '0'")
      );
    }

    case 'integer': {
      const { lower, upper } = integerBounds(valueKind.bits, valueKind.signed);
      const value = parseIntegerLiteral(literal);
      if (value === undefined || value < lower || value > upper) {
        return failure(
          createInvalidValueError(
            type.typeName,
            literal,
            `must be a valid integer value >= ${lower.toString()} and <= ${upper.toString()}`
          )
        );
      }
      return success(valueKind.bits === 64 ? value : Number(value));
    }

    case 'float': {
      const value = parseFloatLiteral(literal);
      if (value === undefined) {
        return failure(
          createInvalidValueError(
            type.typeName,
            literal,
            "must be a floating point number using '.' as the separator"
          )
        );
      }
      return success(value);
    }

    case 'string':
      return parseStringValue(type, literal);
  }
}

/**
 * Renders a parsed value the way constant and field renderings show it.
 *
 * Scalars render bare; arrays render as `[1, 2]`, with string elements
 * single-quoted.
 *
 * @param value - The value.
 * @returns The rendered text.
 */
export function renderValue(value: FieldValue): string {
  if (typeof value === 'object') {
    const elements = value.map((element) =>
      typeof element === 'string' ? `'${element}'` : String(element)
    );
    return `[${elements.join(', ')}]`;
  }
  return String(value);
}

/**
 * Value equality, element-wise for arrays.
 *
 * @param a - First value.
 * @param b - Second value.
 * @returns Whether both values are equal.
 */
export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (typeof a === 'object' || typeof b === 'object') {
    if (typeof a !== 'object' || typeof b !== 'object' || a.length !== b.length) {
      return false;
    }
    return a.every((element, index) => Object.is(element, b[index]));
  }
  return Object.is(a, b);
}
