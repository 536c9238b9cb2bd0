/**
 * Error taxonomy for type resolution, value parsing and specification assembly.
 *
 * Every fatal condition is modeled as a tagged error variant returned through
 * {@link IdlResult}; callers switch on `kind` to decide how to report it.
 *
 * @packageDocumentation
 */

/**
 * A package, message, field or constant identifier fails its grammar, or a
 * type string has an unresolvable segment structure.
 */
export interface ResourceNameError {
  readonly kind: 'ResourceNameError';
  readonly message: string;
  /** The offending token. */
  readonly name: string;
}

/**
 * Malformed array-size or string-bound syntax, or an inconsistent
 * bracket/quote structure in a value literal.
 */
export interface FormatError {
  readonly kind: 'FormatError';
  readonly message: string;
  /** The text that could not be parsed. */
  readonly input: string;
}

/**
 * A literal that cannot be converted to its type, including range and
 * length violations.
 */
export interface InvalidValueError {
  readonly kind: 'InvalidValueError';
  readonly message: string;
  /** Rendered type the literal was parsed against. */
  readonly typeName: string;
  readonly literal: string;
  /** Human-readable description of the violated constraint. */
  readonly reason: string;
  /** 0-based index of the failing element when the literal is an array. */
  readonly elementIndex?: number;
  /** The element-level error wrapped by an array failure. */
  readonly cause?: IdlError;
}

/**
 * Reasons a specification is rejected as a whole.
 */
export type SpecificationErrorReason =
  | 'duplicate_field_names'
  | 'duplicate_constant_names'
  | 'invalid_constant_type'
  | 'unknown_field_type';

/**
 * Duplicate names, a non-primitive constant type, or a field referencing a
 * message type absent from the known-types registry.
 */
export interface SpecificationError {
  readonly kind: 'SpecificationError';
  readonly message: string;
  readonly reason: SpecificationErrorReason;
  /** Every name involved, sorted where the reason is a duplicate. */
  readonly names: readonly string[];
}

/**
 * Closed union of all errors produced by the core.
 */
export type IdlError = ResourceNameError | FormatError | InvalidValueError | SpecificationError;

/**
 * Discriminant values of {@link IdlError}.
 */
export type IdlErrorKind = IdlError['kind'];

/**
 * Result of a core operation: either a value or an error, never both.
 */
export type IdlResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: IdlError };

/**
 * Creates a successful result.
 *
 * @param value - The produced value.
 * @returns A successful IdlResult.
 */
export function success<T>(value: T): Extract<IdlResult<T>, { success: true }> {
  return { success: true, value };
}

/**
 * Creates a failure result.
 *
 * @param error - The error that occurred.
 * @returns A failed IdlResult.
 */
export function failure(error: IdlError): Extract<IdlResult<never>, { success: false }> {
  return { success: false, error };
}

/**
 * Creates a ResourceNameError.
 *
 * @param name - The offending identifier or type string.
 * @param message - Optional message; defaults to a description naming the token.
 * @returns A ResourceNameError instance.
 */
export function createResourceNameError(name: string, message?: string): ResourceNameError {
  return {
    kind: 'ResourceNameError',
    message: message ?? `invalid resource name '${name}'`,
    name,
  };
}

/**
 * Creates a FormatError.
 *
 * @param input - The text that could not be parsed.
 * @param message - Description of the problem.
 * @returns A FormatError instance.
 */
export function createFormatError(input: string, message: string): FormatError {
  return { kind: 'FormatError', message, input };
}

/**
 * Creates an InvalidValueError.
 *
 * @param typeName - Rendered type the literal was parsed against.
 * @param literal - The literal that failed.
 * @param reason - Description of the violated constraint.
 * @param options - Element index and wrapped cause for array failures.
 * @returns An InvalidValueError instance.
 */
export function createInvalidValueError(
  typeName: string,
  literal: string,
  reason: string,
  options?: {
    elementIndex?: number;
    cause?: IdlError;
  }
): InvalidValueError {
  const base: InvalidValueError = {
    kind: 'InvalidValueError',
    message: `value '${literal}' can not be converted to type '${typeName}': ${reason}`,
    typeName,
    literal,
    reason,
  };

  const { elementIndex, cause } = options ?? {};

  // Build conditionally for exactOptionalPropertyTypes compliance
  if (elementIndex !== undefined && cause !== undefined) {
    return { ...base, elementIndex, cause };
  }
  if (elementIndex !== undefined) {
    return { ...base, elementIndex };
  }
  if (cause !== undefined) {
    return { ...base, cause };
  }

  return base;
}

/**
 * Creates a SpecificationError.
 *
 * @param reason - Why the specification was rejected.
 * @param message - Human-readable description.
 * @param names - Names involved in the failure.
 * @returns A SpecificationError instance.
 */
export function createSpecificationError(
  reason: SpecificationErrorReason,
  message: string,
  names: readonly string[]
): SpecificationError {
  return { kind: 'SpecificationError', message, reason, names };
}

/**
 * Error class wrapping an {@link IdlError} for callers that prefer exceptions.
 */
export class IdlResultError extends Error {
  /** The wrapped error value. */
  public readonly error: IdlError;

  /**
   * Creates a new IdlResultError.
   *
   * @param error - The error value to wrap.
   */
  constructor(error: IdlError) {
    super(error.message);
    this.name = 'IdlResultError';
    this.error = error;
  }
}

/**
 * Returns the value of a successful result or throws its error.
 *
 * @param result - The result to unwrap.
 * @returns The contained value.
 * @throws IdlResultError if the result is a failure.
 *
 * @example
 * ```typescript
 * const type = unwrapResult(parseType('int32[3]'));
 * ```
 */
export function unwrapResult<T>(result: IdlResult<T>): T {
  if (!result.success) {
    throw new IdlResultError(result.error);
  }
  return result.value;
}
