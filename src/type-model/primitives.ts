/**
 * The closed primitive type table and the value kind behind each name.
 *
 * @packageDocumentation
 */

/**
 * Every primitive type name accepted in a type string.
 */
export const PRIMITIVE_TYPES = [
  'short',
  'unsigned short',
  'long',
  'unsigned long',
  'long long',
  'unsigned long long',
  'float',
  'double',
  'long double',
  'char',
  'wchar',
  'boolean',
  'octet',
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
  'string',
  'wstring',
  'bool',
  'byte',
  'float32',
  'float64',
] as const;

/**
 * A primitive type name.
 */
export type PrimitiveTypeName = (typeof PRIMITIVE_TYPES)[number];

/** Integer widths in bits. */
export type IntegerWidth = 8 | 16 | 32 | 64;

/**
 * How literals of a primitive type are parsed.
 */
export type PrimitiveValueKind =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'integer'; readonly bits: IntegerWidth; readonly signed: boolean }
  | { readonly kind: 'float' }
  | { readonly kind: 'string' };

const BOOLEAN: PrimitiveValueKind = { kind: 'boolean' };
const FLOAT: PrimitiveValueKind = { kind: 'float' };
const STRING: PrimitiveValueKind = { kind: 'string' };

function integer(bits: IntegerWidth, signed: boolean): PrimitiveValueKind {
  return { kind: 'integer', bits, signed };
}

/**
 * Value kind of each primitive name.
 *
 * `byte` and `octet` share the `uint8` bounds, `char` the `int8` bounds and
 * `wchar` the `uint16` bounds; the names stay distinct types.
 */
export const PRIMITIVE_VALUE_KINDS: Readonly<Record<PrimitiveTypeName, PrimitiveValueKind>> = {
  short: integer(16, true),
  'unsigned short': integer(16, false),
  long: integer(32, true),
  'unsigned long': integer(32, false),
  'long long': integer(64, true),
  'unsigned long long': integer(64, false),
  float: FLOAT,
  double: FLOAT,
  'long double': FLOAT,
  char: integer(8, true),
  wchar: integer(16, false),
  boolean: BOOLEAN,
  octet: integer(8, false),
  int8: integer(8, true),
  uint8: integer(8, false),
  int16: integer(16, true),
  uint16: integer(16, false),
  int32: integer(32, true),
  uint32: integer(32, false),
  int64: integer(64, true),
  uint64: integer(64, false),
  string: STRING,
  wstring: STRING,
  bool: BOOLEAN,
  byte: integer(8, false),
  float32: FLOAT,
  float64: FLOAT,
};

const PRIMITIVE_TYPE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

/**
 * Type guard for primitive type names.
 *
 * @param name - The candidate type string.
 * @returns Whether the string is exactly a primitive type name.
 */
export function isPrimitiveTypeName(name: string): name is PrimitiveTypeName {
  return PRIMITIVE_TYPE_SET.has(name);
}
