/**
 * Message specifications: an ordered list of fields and constants under a
 * namespaced message identity.
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
import type { NamingMode } from '../naming/index.js';
import {
  baseTypeEquals,
  NAMESPACE_SEPARATOR,
  parseBaseType,
  parseType,
  type NamespacedBaseType,
} from '../type-model/index.js';
import { constantEquals, createConstant, type Constant } from './constant.js';
import { createField, fieldEquals, type Field } from './field.js';

/**
 * A validated message definition.
 */
export interface MessageSpecification {
  readonly kind: 'message';
  readonly baseType: NamespacedBaseType;
  readonly messageName: string;
  readonly fields: readonly Field[];
  readonly constants: readonly Constant[];
}

/**
 * Options for message assembly.
 */
export interface MessageOptions {
  /** Field- and message-name grammar to apply. */
  readonly naming?: NamingMode;
}

/**
 * A field declaration as produced by the upstream tokenizer.
 */
export interface RawFieldDefinition {
  readonly type: string;
  readonly name: string;
  readonly defaultValue?: string;
}

/**
 * A constant declaration as produced by the upstream tokenizer.
 */
export interface RawConstantDefinition {
  readonly type: string;
  readonly name: string;
  readonly value: string;
}

/**
 * The raw declarations of one message definition file.
 */
export interface RawMessageDefinition {
  readonly packageName: string;
  readonly namespace: string;
  readonly messageName: string;
  readonly fields: readonly RawFieldDefinition[];
  readonly constants: readonly RawConstantDefinition[];
}

/**
 * Collects every name occurring more than once.
 *
 * @param names - Names in declaration order.
 * @returns The duplicated names, sorted and unique.
 */
export function findDuplicateNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates].sort();
}

function checkDuplicates(
  kind: 'field' | 'constant',
  names: readonly string[]
): IdlResult<never> | undefined {
  const duplicates = findDuplicateNames(names);
  if (duplicates.length === 0) {
    return undefined;
  }
  return failure(
    createSpecificationError(
      kind === 'field' ? 'duplicate_field_names' : 'duplicate_constant_names',
      `the ${kind}s contain duplicate names: ${duplicates.join(', ')}`,
      duplicates
    )
  );
}

/**
 * Assembles a message specification from validated fields and constants.
 *
 * Field names must be pairwise distinct, and so must constant names; a field
 * and a constant may share a name. All duplicates are reported together.
 *
 * @param packageName - Package of the message.
 * @param namespace - Namespace of the message, e.g. `msg`.
 * @param messageName - Name of the message.
 * @param fields - Fields in declaration order.
 * @param constants - Constants in declaration order.
 * @param options - Naming grammar.
 * @returns The specification or the first failure.
 */
export function createMessageSpecification(
  packageName: string,
  namespace: string,
  messageName: string,
  fields: readonly Field[],
  constants: readonly Constant[],
  options: MessageOptions = {}
): IdlResult<MessageSpecification> {
  const qualified = [packageName, namespace, messageName].join(NAMESPACE_SEPARATOR);
  const baseType = parseBaseType(qualified, { naming: options.naming ?? 'strict' });
  if (!baseType.success) {
    return baseType;
  }
  if (baseType.value.kind !== 'namespaced') {
    return failure(createResourceNameError(qualified));
  }

  const fieldDuplicates = checkDuplicates('field', fields.map((field) => field.name));
  if (fieldDuplicates !== undefined) {
    return fieldDuplicates;
  }
  const constantDuplicates = checkDuplicates('constant', constants.map((constant) => constant.name));
  if (constantDuplicates !== undefined) {
    return constantDuplicates;
  }

  return success({
    kind: 'message',
    baseType: baseType.value,
    messageName,
    fields: [...fields],
    constants: [...constants],
  });
}

/**
 * Builds a message specification from raw declarations.
 *
 * Unqualified field types resolve against the message's own package and
 * namespace. Fields are built and checked for duplicates before constants.
 *
 * @param definition - The raw declarations.
 * @param options - Naming grammar.
 * @returns The specification or the first failure.
 *
 * @example
 * ```typescript
 * parseMessageSpecification({
 *   packageName: 'geometry',
 *   namespace: 'msg',
 *   messageName: 'Polygon',
 *   fields: [{ type: 'Point[]', name: 'points' }],
 *   constants: [{ type: 'uint8', name: 'MAX_POINTS', value: '64' }],
 * });
 * ```
 */
export function parseMessageSpecification(
  definition: RawMessageDefinition,
  options: MessageOptions = {}
): IdlResult<MessageSpecification> {
  const naming = options.naming ?? 'strict';

  const fields: Field[] = [];
  for (const raw of definition.fields) {
    const type = parseType(raw.type, {
      contextPackageName: definition.packageName,
      contextNamespace: definition.namespace,
      naming,
    });
    if (!type.success) {
      return type;
    }
    const field = createField(type.value, raw.name, raw.defaultValue, { naming });
    if (!field.success) {
      return field;
    }
    fields.push(field.value);
  }
  const fieldDuplicates = checkDuplicates('field', fields.map((field) => field.name));
  if (fieldDuplicates !== undefined) {
    return fieldDuplicates;
  }

  const constants: Constant[] = [];
  for (const raw of definition.constants) {
    const constant = createConstant(raw.type, raw.name, raw.value);
    if (!constant.success) {
      return constant;
    }
    constants.push(constant.value);
  }

  return createMessageSpecification(
    definition.packageName,
    definition.namespace,
    definition.messageName,
    fields,
    constants,
    { naming }
  );
}

/**
 * Identity plus order-sensitive field and constant equality.
 */
export function messageSpecificationEquals(a: MessageSpecification, b: MessageSpecification): boolean {
  return (
    baseTypeEquals(a.baseType, b.baseType) &&
    a.fields.length === b.fields.length &&
    a.fields.every((field, index) => {
      const other = b.fields[index];
      return other !== undefined && fieldEquals(field, other);
    }) &&
    a.constants.length === b.constants.length &&
    a.constants.every((constant, index) => {
      const other = b.constants[index];
      return other !== undefined && constantEquals(constant, other);
    })
  );
}
