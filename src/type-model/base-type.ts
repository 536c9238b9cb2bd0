/**
 * BaseType: the identity of a type independent of array-ness.
 *
 * @packageDocumentation
 */

import {
  createFormatError,
  createResourceNameError,
  failure,
  success,
  type IdlResult,
} from '../errors/index.js';
import { isValidMessageName, isValidPackageName, type NamingMode } from '../naming/index.js';
import { DISPLAY_SEPARATOR, NAMESPACE_SEPARATOR, STRING_UPPER_BOUND_TOKEN } from './constants.js';
import { isPrimitiveTypeName, type PrimitiveTypeName } from './primitives.js';

/**
 * A primitive scalar type without a length bound.
 */
export interface PrimitiveBaseType {
  readonly kind: 'primitive';
  readonly typeName: PrimitiveTypeName;
}

/**
 * A `string` carrying an explicit length ceiling.
 */
export interface BoundedStringBaseType {
  readonly kind: 'bounded-string';
  readonly typeName: 'string';
  /** Maximum length in characters, strictly positive. */
  readonly stringUpperBound: number;
}

/**
 * A reference to another message definition.
 */
export interface NamespacedBaseType {
  readonly kind: 'namespaced';
  readonly packageName: string;
  readonly namespace: string;
  readonly typeName: string;
}

/**
 * Identity of a type. Exactly one variant holds for any type string.
 */
export type BaseType = PrimitiveBaseType | BoundedStringBaseType | NamespacedBaseType;

/**
 * Contextual package and namespace for resolving unqualified message names,
 * plus the naming grammar to check resolved names against.
 */
export interface ResolveOptions {
  readonly contextPackageName?: string;
  readonly contextNamespace?: string;
  readonly naming?: NamingMode;
}

/**
 * Whether a base type is primitive, i.e. carries no package name.
 *
 * @param base - The base type to check.
 * @returns True for primitive and bounded-string types.
 */
export function isPrimitive(base: BaseType): base is PrimitiveBaseType | BoundedStringBaseType {
  return base.kind !== 'namespaced';
}

/**
 * Parses a strictly positive decimal integer.
 *
 * @param text - Digits only; signs and whitespace are rejected.
 * @returns The integer, or undefined when the text is not a positive integer.
 */
export function parsePositiveInteger(text: string): number | undefined {
  if (!/^[0-9]+$/.test(text)) {
    return undefined;
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value) || value <= 0) {
    return undefined;
  }
  return value;
}

/**
 * Parses a type string without array brackets into a BaseType.
 *
 * Resolution order: the primitive table, then `string<=N`, then a
 * `package::namespace::Type` triple, then an unqualified `Type` resolved
 * against both contextual values.
 *
 * @param typeString - The type string.
 * @param options - Context for unqualified names and the naming grammar.
 * @returns The resolved BaseType or the error describing why it cannot be resolved.
 *
 * @example
 * ```typescript
 * parseBaseType('geometry::msg::Point');
 * parseBaseType('Point', { contextPackageName: 'geometry', contextNamespace: 'msg' });
 * ```
 */
export function parseBaseType(typeString: string, options: ResolveOptions = {}): IdlResult<BaseType> {
  if (isPrimitiveTypeName(typeString)) {
    return success({ kind: 'primitive', typeName: typeString });
  }

  const boundPrefix = `string${STRING_UPPER_BOUND_TOKEN}`;
  if (typeString.startsWith(boundPrefix)) {
    const bound = parsePositiveInteger(typeString.slice(boundPrefix.length));
    if (bound === undefined) {
      return failure(
        createFormatError(
          typeString,
          `the upper bound of the string type '${typeString}' must be a valid integer value > 0`
        )
      );
    }
    return success({ kind: 'bounded-string', typeName: 'string', stringUpperBound: bound });
  }

  const parts = typeString.split(NAMESPACE_SEPARATOR);
  const { contextPackageName, contextNamespace, naming = 'strict' } = options;

  let packageName: string;
  let namespace: string;
  let typeName: string;
  const [first, second, third] = parts;
  if (parts.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
    packageName = first;
    namespace = second;
    typeName = third;
  } else if (
    parts.length === 1 &&
    contextPackageName !== undefined &&
    contextNamespace !== undefined
  ) {
    packageName = contextPackageName;
    namespace = contextNamespace;
    typeName = typeString;
  } else {
    return failure(
      createResourceNameError(
        typeString,
        `type '${typeString}' must be a primitive type, 'package::namespace::Type', ` +
          'or an unqualified type with both package and namespace context'
      )
    );
  }

  if (!isValidPackageName(packageName)) {
    return failure(
      createResourceNameError(packageName, `invalid package name '${packageName}' in type '${typeString}'`)
    );
  }
  if (!isValidMessageName(typeName, naming)) {
    return failure(
      createResourceNameError(typeName, `invalid message name '${typeName}' in type '${typeString}'`)
    );
  }

  return success({ kind: 'namespaced', packageName, namespace, typeName });
}

/**
 * Renders a base type in display form: `package/Type`, `string<=N` or the
 * primitive name.
 *
 * @param base - The base type.
 * @returns The display string.
 */
export function renderBaseType(base: BaseType): string {
  switch (base.kind) {
    case 'primitive':
      return base.typeName;
    case 'bounded-string':
      return `${base.typeName}${STRING_UPPER_BOUND_TOKEN}${String(base.stringUpperBound)}`;
    case 'namespaced':
      return `${base.packageName}${DISPLAY_SEPARATOR}${base.typeName}`;
  }
}

/**
 * Renders a base type as a type string that {@link parseBaseType} accepts
 * without context: `package::namespace::Type` for references.
 *
 * @param base - The base type.
 * @returns The canonical type string.
 */
export function formatBaseType(base: BaseType): string {
  if (base.kind === 'namespaced') {
    return [base.packageName, base.namespace, base.typeName].join(NAMESPACE_SEPARATOR);
  }
  return renderBaseType(base);
}

function packageNameOf(base: BaseType): string | undefined {
  return base.kind === 'namespaced' ? base.packageName : undefined;
}

function stringUpperBoundOf(base: BaseType): number | undefined {
  return base.kind === 'bounded-string' ? base.stringUpperBound : undefined;
}

/**
 * Structural equality on package name, type name and string bound.
 *
 * The namespace does not take part in identity.
 *
 * @param a - First base type.
 * @param b - Second base type.
 * @returns Whether both denote the same type.
 */
export function baseTypeEquals(a: BaseType, b: BaseType): boolean {
  return (
    packageNameOf(a) === packageNameOf(b) &&
    a.typeName === b.typeName &&
    stringUpperBoundOf(a) === stringUpperBoundOf(b)
  );
}

/**
 * Hash key consistent with {@link baseTypeEquals}.
 *
 * @param base - The base type.
 * @returns A string equal for exactly the base types that compare equal.
 */
export function baseTypeKey(base: BaseType): string {
  return JSON.stringify([packageNameOf(base) ?? null, base.typeName, stringUpperBoundOf(base) ?? null]);
}

/**
 * A set of base types keyed structurally.
 *
 * Used as the registry of known message types during cross-reference
 * validation.
 */
export class BaseTypeSet implements Iterable<BaseType> {
  private readonly entries = new Map<string, BaseType>();

  /**
   * Creates a set from the given base types.
   * @param types - Initial members.
   */
  constructor(types: Iterable<BaseType> = []) {
    for (const type of types) {
      this.entries.set(baseTypeKey(type), type);
    }
  }

  /** Number of distinct members. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Checks membership by structural identity.
   * @param type - The base type to look up.
   * @returns Whether an equal base type is a member.
   */
  has(type: BaseType): boolean {
    return this.entries.has(baseTypeKey(type));
  }

  [Symbol.iterator](): Iterator<BaseType> {
    return this.entries.values();
  }
}
