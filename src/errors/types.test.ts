import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  createFormatError,
  createInvalidValueError,
  createResourceNameError,
  createSpecificationError,
  failure,
  IdlResultError,
  success,
  unwrapResult,
} from './index.js';

describe('Error types', () => {
  describe('createResourceNameError', () => {
    it('should default the message to name the token', () => {
      expect(createResourceNameError('Bad-Name')).toEqual({
        kind: 'ResourceNameError',
        message: "invalid resource name 'Bad-Name'",
        name: 'Bad-Name',
      });
    });

    it('should keep a supplied message', () => {
      expect(createResourceNameError('x', 'custom').message).toBe('custom');
    });
  });

  describe('createFormatError', () => {
    it('should carry the offending input', () => {
      expect(createFormatError('int32]', 'broken')).toEqual({
        kind: 'FormatError',
        message: 'broken',
        input: 'int32]',
      });
    });
  });

  describe('createInvalidValueError', () => {
    it('should compose the message from type, literal and reason', () => {
      const error = createInvalidValueError('int8', '300', 'too large');

      expect(error.message).toBe("value '300' can not be converted to type 'int8': too large");
      expect(error).not.toHaveProperty('elementIndex');
      expect(error).not.toHaveProperty('cause');
    });

    it('should only include element details that are given', () => {
      const cause = createInvalidValueError('int8', '300', 'too large');

      expect(createInvalidValueError('int8[]', '[300]', 'r', { elementIndex: 0 })).toHaveProperty('elementIndex', 0);
      expect(createInvalidValueError('int8[]', '[300]', 'r', { elementIndex: 0 })).not.toHaveProperty('cause');
      expect(createInvalidValueError('int8[]', '[300]', 'r', { cause })).not.toHaveProperty('elementIndex');
      expect(createInvalidValueError('int8[]', '[300]', 'r', { elementIndex: 2, cause })).toMatchObject({
        elementIndex: 2,
        cause,
      });
    });
  });

  describe('createSpecificationError', () => {
    it('should record reason and names', () => {
      expect(createSpecificationError('duplicate_field_names', 'dup', ['x'])).toEqual({
        kind: 'SpecificationError',
        message: 'dup',
        reason: 'duplicate_field_names',
        names: ['x'],
      });
    });
  });

  describe('unwrapResult', () => {
    it('should return the value of a success', () => {
      fc.assert(
        fc.property(fc.integer(), (value) => {
          expect(unwrapResult(success(value))).toBe(value);
        })
      );
    });

    it('should throw an IdlResultError carrying the error', () => {
      const error = createFormatError('x', 'bad input');

      expect(() => unwrapResult(failure(error))).toThrow(IdlResultError);
      try {
        unwrapResult(failure(error));
      } catch (thrown) {
        expect(thrown).toBeInstanceOf(IdlResultError);
        if (thrown instanceof IdlResultError) {
          expect(thrown.error).toBe(error);
          expect(thrown.message).toBe('bad input');
          expect(thrown.name).toBe('IdlResultError');
        }
      }
    });
  });
});
