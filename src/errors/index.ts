/**
 * Error taxonomy and result type shared by every module.
 *
 * @packageDocumentation
 */

export {
  createFormatError,
  createInvalidValueError,
  createResourceNameError,
  createSpecificationError,
  failure,
  IdlResultError,
  success,
  unwrapResult,
} from './types.js';
export type {
  FormatError,
  IdlError,
  IdlErrorKind,
  IdlResult,
  InvalidValueError,
  ResourceNameError,
  SpecificationError,
  SpecificationErrorReason,
} from './types.js';
