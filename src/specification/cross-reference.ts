/**
 * Checks that every message type a specification references is known.
 *
 * @packageDocumentation
 */

import {
  createSpecificationError,
  failure,
  success,
  type IdlResult,
} from '../errors/index.js';
import {
  BaseTypeSet,
  isPrimitive,
  renderBaseType,
  toBaseType,
  type BaseType,
} from '../type-model/index.js';
import { renderField, type Field } from './field.js';
import type { MessageSpecification } from './message.js';
import { renderServiceName, type ServiceSpecification } from './service.js';

/**
 * Any assembled specification.
 */
export type Specification = MessageSpecification | ServiceSpecification;

/**
 * All fields of a specification; for services, request fields then
 * response fields.
 *
 * @param spec - The specification.
 * @returns The fields in order.
 */
export function specificationFields(spec: Specification): readonly Field[] {
  return spec.kind === 'message' ? spec.fields : [...spec.request.fields, ...spec.response.fields];
}

/**
 * Display name of a specification: `package/Name`.
 *
 * @param spec - The specification.
 * @returns The rendered name.
 */
export function renderSpecificationName(spec: Specification): string {
  return spec.kind === 'message' ? renderBaseType(spec.baseType) : renderServiceName(spec);
}

/**
 * Validates that every non-primitive field type is in the known-types set.
 *
 * The set is supplied per call and never retained.
 *
 * @param spec - A message or service specification.
 * @param knownTypes - Base types of every known message.
 * @returns Success, or a SpecificationError naming the first unknown field.
 *
 * @example
 * ```typescript
 * const result = validateFieldTypes(spec, [pointType, polygonType]);
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function validateFieldTypes(
  spec: Specification,
  knownTypes: Iterable<BaseType>
): IdlResult<void> {
  const known = knownTypes instanceof BaseTypeSet ? knownTypes : new BaseTypeSet(knownTypes);

  for (const field of specificationFields(spec)) {
    if (isPrimitive(field.type)) {
      continue;
    }
    if (!known.has(toBaseType(field.type))) {
      const specType = spec.kind === 'message' ? 'Message' : 'Service';
      const specName = renderSpecificationName(spec);
      const rendered = renderField(field);
      return failure(
        createSpecificationError(
          'unknown_field_type',
          `${specType} interface '${specName}' contains an unknown field type: ${rendered}`,
          [specName, rendered]
        )
      );
    }
  }

  return success(undefined);
}
