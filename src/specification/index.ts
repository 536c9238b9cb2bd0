/**
 * Specification model: constants, fields, messages, services and
 * cross-reference validation.
 *
 * @packageDocumentation
 */

export { constantEquals, createConstant, renderConstant } from './constant.js';
export type { Constant } from './constant.js';
export { createField, fieldEquals, renderField } from './field.js';
export type { Field, FieldOptions } from './field.js';
export {
  createMessageSpecification,
  findDuplicateNames,
  messageSpecificationEquals,
  parseMessageSpecification,
} from './message.js';
export type {
  MessageOptions,
  MessageSpecification,
  RawConstantDefinition,
  RawFieldDefinition,
  RawMessageDefinition,
} from './message.js';
export {
  createServiceSpecification,
  parseServiceSpecification,
  renderServiceName,
  serviceSpecificationEquals,
} from './service.js';
export type { RawServiceDefinition, RawServiceMessage, ServiceSpecification } from './service.js';
export {
  renderSpecificationName,
  specificationFields,
  validateFieldTypes,
} from './cross-reference.js';
export type { Specification } from './cross-reference.js';
