import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { unwrapResult } from '../errors/index.js';
import { parseType, type IntegerWidth, type ScalarPrimitiveType } from '../type-model/index.js';
import { fieldValuesEqual, integerBounds, parsePrimitiveValue, renderValue } from './index.js';

function scalar(typeString: string): ScalarPrimitiveType {
  const type = unwrapResult(parseType(typeString));
  if (type.kind === 'namespaced' || type.array.mode !== 'none') {
    throw new Error(`${typeString} is not a scalar primitive`);
  }
  return { ...type, array: { mode: 'none' } };
}

describe('Primitive Value Parser', () => {
  describe('boolean types', () => {
    it.each([
      ['true', true],
      ['TRUE', true],
      ['1', true],
      ['false', false],
      ['False', false],
      ['0', false],
    ])('should parse %s as %s', (literal, expected) => {
      expect(unwrapResult(parsePrimitiveValue(scalar('bool'), literal))).toBe(expected);
      expect(unwrapResult(parsePrimitiveValue(scalar('boolean'), literal))).toBe(expected);
    });

    it('should reject anything else', () => {
      const result = parsePrimitiveValue(scalar('bool'), 'yes');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          kind: 'InvalidValueError',
          message: "value 'yes' can not be converted to type 'bool': must be either 'true' / '1' or 'false' / '0'",
          typeName: 'bool',
          literal: 'yes',
          reason: "must be either 'true' / '1' or 'false' / '0'",
        });
      }
    });
  });

  describe('integer types', () => {
    const widths: [string, IntegerWidth, boolean][] = [
      ['int8', 8, true],
      ['uint8', 8, false],
      ['int16', 16, true],
      ['uint16', 16, false],
      ['int32', 32, true],
      ['uint32', 32, false],
      ['int64', 64, true],
      ['uint64', 64, false],
    ];

    it.each(widths)('should accept both bounds of %s and reject one beyond', (name, bits, signed) => {
      const { lower, upper } = integerBounds(bits, signed);
      const type = scalar(name);

      expect(parsePrimitiveValue(type, lower.toString()).success).toBe(true);
      expect(parsePrimitiveValue(type, upper.toString()).success).toBe(true);
      expect(parsePrimitiveValue(type, (lower - 1n).toString()).success).toBe(false);
      expect(parsePrimitiveValue(type, (upper + 1n).toString()).success).toBe(false);
    });

    it('should compute the bounds of each width', () => {
      expect(integerBounds(8, true)).toEqual({ lower: -128n, upper: 127n });
      expect(integerBounds(8, false)).toEqual({ lower: 0n, upper: 255n });
      expect(integerBounds(64, true)).toEqual({
        lower: -9223372036854775808n,
        upper: 9223372036854775807n,
      });
      expect(integerBounds(64, false)).toEqual({ lower: 0n, upper: 18446744073709551615n });
    });

    it('should state the bounds in the error', () => {
      const result = parsePrimitiveValue(scalar('int16'), '40000');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          "value '40000' can not be converted to type 'int16': must be a valid integer value >= -32768 and <= 32767"
        );
      }
    });

    it('should return numbers up to 32 bits and bigints for 64 bits', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('int32'), '-7'))).toBe(-7);
      expect(unwrapResult(parsePrimitiveValue(scalar('uint64'), '18446744073709551615'))).toBe(
        18446744073709551615n
      );
      expect(unwrapResult(parsePrimitiveValue(scalar('int64'), '5'))).toBe(5n);
    });

    it('should accept a sign, surrounding whitespace and digit separators', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('int32'), '+12'))).toBe(12);
      expect(unwrapResult(parsePrimitiveValue(scalar('int32'), ' 12 '))).toBe(12);
      expect(unwrapResult(parsePrimitiveValue(scalar('int32'), '1_000'))).toBe(1000);
    });

    it.each(['1.0', '0x10', '', '1e3', 'ten', '1__0'])('should reject the non-integer %j', (literal) => {
      const result = parsePrimitiveValue(scalar('int32'), literal);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('InvalidValueError');
      }
    });

    it('should give byte and octet the uint8 bounds under their own names', () => {
      for (const name of ['byte', 'octet']) {
        expect(unwrapResult(parsePrimitiveValue(scalar(name), '255'))).toBe(255);
        const result = parsePrimitiveValue(scalar(name), '-1');
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error).toMatchObject({
            typeName: name,
            reason: 'must be a valid integer value >= 0 and <= 255',
          });
        }
      }
    });

    it('should give char the int8 bounds', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('char'), '-128'))).toBe(-128);
      expect(parsePrimitiveValue(scalar('char'), '128').success).toBe(false);
    });

    it('should map legacy names to their widths', () => {
      expect(parsePrimitiveValue(scalar('short'), '-32768').success).toBe(true);
      expect(parsePrimitiveValue(scalar('unsigned short'), '65536').success).toBe(false);
      expect(parsePrimitiveValue(scalar('unsigned long'), '4294967295').success).toBe(true);
      expect(unwrapResult(parsePrimitiveValue(scalar('long long'), '-1'))).toBe(-1n);
    });

    it('should accept every in-range int16 literal', () => {
      fc.assert(
        fc.property(fc.integer({ min: -32768, max: 32767 }), (value) => {
          expect(unwrapResult(parsePrimitiveValue(scalar('int16'), String(value)))).toBe(value);
        })
      );
    });
  });

  describe('float types', () => {
    it.each([
      ['1.5', 1.5],
      ['-0.25', -0.25],
      ['3', 3],
      ['.5', 0.5],
      ['2.', 2],
      ['1e3', 1000],
      ['-1.5E-2', -0.015],
    ])('should parse %s', (literal, expected) => {
      expect(unwrapResult(parsePrimitiveValue(scalar('float64'), literal))).toBe(expected);
    });

    it('should parse infinities and NaN', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('float32'), 'inf'))).toBe(Number.POSITIVE_INFINITY);
      expect(unwrapResult(parsePrimitiveValue(scalar('double'), '-Infinity'))).toBe(
        Number.NEGATIVE_INFINITY
      );
      expect(unwrapResult(parsePrimitiveValue(scalar('float'), 'nan'))).toBeNaN();
    });

    it.each(['1,5', '', 'one', '1.2.3', '0x1p3'])('should reject %j', (literal) => {
      const result = parsePrimitiveValue(scalar('float64'), literal);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          kind: 'InvalidValueError',
          reason: "must be a floating point number using '.' as the separator",
        });
      }
    });
  });

  describe('string types', () => {
    it('should keep unquoted literals as they are', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), 'hello world'))).toBe('hello world');
    });

    it('should strip matching outer quotes, keeping inner spaces', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), '" padded "'))).toBe(' padded ');
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), "'single'"))).toBe('single');
    });

    it('should not strip mismatched quotes', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), `"mixed'`))).toBe(`"mixed'`);
    });

    it('should unescape the wrapping quote character', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), "'it\\'s'"))).toBe("it's");
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), '"say \\"hi\\""'))).toBe('say "hi"');
    });

    it('should leave the other quote character alone', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string'), `"it's"`))).toBe("it's");
    });

    it('should reject an unescaped inner quote with a format error', () => {
      const result = parsePrimitiveValue(scalar('string'), "'it's'");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('FormatError');
        expect(result.error.message).toBe(
          "value ''it's'' can not be converted to type 'string': string inner quotes not properly escaped"
        );
      }
    });

    it('should accept a string at its bound and reject one character more', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string<=5'), 'abcde'))).toBe('abcde');

      const result = parsePrimitiveValue(scalar('string<=5'), 'abcdef');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          kind: 'InvalidValueError',
          message:
            "value 'abcdef' can not be converted to type 'string<=5': string must not exceed the maximum length of 5 characters",
          typeName: 'string<=5',
          literal: 'abcdef',
          reason: 'string must not exceed the maximum length of 5 characters',
        });
      }
    });

    it('should measure the bound after removing quotes', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string<=3'), "'abc'"))).toBe('abc');
    });

    it('should count characters rather than UTF-16 code units', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('string<=2'), '😀😀'))).toBe('😀😀');
    });

    it('should parse wstring like string', () => {
      expect(unwrapResult(parsePrimitiveValue(scalar('wstring'), '"wide"'))).toBe('wide');
    });
  });

  describe('renderValue', () => {
    it('should render scalars bare and arrays bracketed', () => {
      expect(renderValue(100)).toBe('100');
      expect(renderValue(5n)).toBe('5');
      expect(renderValue(true)).toBe('true');
      expect(renderValue('text')).toBe('text');
      expect(renderValue([1, 2, 3])).toBe('[1, 2, 3]');
      expect(renderValue(['a', 'b'])).toBe("['a', 'b']");
      expect(renderValue([])).toBe('[]');
    });
  });

  describe('fieldValuesEqual', () => {
    it('should compare scalars and arrays by value', () => {
      expect(fieldValuesEqual(1, 1)).toBe(true);
      expect(fieldValuesEqual(1n, 1n)).toBe(true);
      expect(fieldValuesEqual(1, 1n)).toBe(false);
      expect(fieldValuesEqual(Number.NaN, Number.NaN)).toBe(true);
      expect(fieldValuesEqual([1, 2], [1, 2])).toBe(true);
      expect(fieldValuesEqual([1, 2], [2, 1])).toBe(false);
      expect(fieldValuesEqual([1], 1)).toBe(false);
    });
  });
});
