import { describe, expect, it } from 'vitest';
import { unwrapResult } from '../errors/index.js';
import {
  baseTypeEquals,
  baseTypeKey,
  BaseTypeSet,
  formatBaseType,
  isPrimitive,
  isPrimitiveTypeName,
  parseBaseType,
  parsePositiveInteger,
  PRIMITIVE_TYPES,
  renderBaseType,
  type ResolveOptions,
} from './index.js';

describe('BaseType', () => {
  describe('parseBaseType', () => {
    it('should resolve every primitive name without a bound', () => {
      for (const name of PRIMITIVE_TYPES) {
        expect(unwrapResult(parseBaseType(name))).toEqual({ kind: 'primitive', typeName: name });
      }
    });

    it('should resolve legacy multi-word primitive names', () => {
      expect(unwrapResult(parseBaseType('unsigned long long'))).toEqual({
        kind: 'primitive',
        typeName: 'unsigned long long',
      });
    });

    it('should resolve a bounded string', () => {
      expect(unwrapResult(parseBaseType('string<=10'))).toEqual({
        kind: 'bounded-string',
        typeName: 'string',
        stringUpperBound: 10,
      });
    });

    it.each(['string<=0', 'string<=', 'string<=-3', 'string<=abc', 'string<=1.5'])(
      'should reject the malformed string bound %s with a format error',
      (typeString) => {
        const result = parseBaseType(typeString);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.kind).toBe('FormatError');
          expect(result.error.message).toBe(
            `the upper bound of the string type '${typeString}' must be a valid integer value > 0`
          );
        }
      }
    );

    it('should resolve an explicit package::namespace::Type triple', () => {
      expect(unwrapResult(parseBaseType('geometry::msg::Point'))).toEqual({
        kind: 'namespaced',
        packageName: 'geometry',
        namespace: 'msg',
        typeName: 'Point',
      });
    });

    it('should resolve an unqualified name against both context values', () => {
      const result = parseBaseType('Point', { contextPackageName: 'geometry', contextNamespace: 'msg' });
      expect(unwrapResult(result)).toEqual({
        kind: 'namespaced',
        packageName: 'geometry',
        namespace: 'msg',
        typeName: 'Point',
      });
    });

    it('should reject an unqualified name when either context value is missing', () => {
      const partialContexts: ResolveOptions[] = [
        {},
        { contextPackageName: 'geometry' },
        { contextNamespace: 'msg' },
      ];
      for (const options of partialContexts) {
        const result = parseBaseType('Point', options);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.kind).toBe('ResourceNameError');
          expect(result.error).toMatchObject({ name: 'Point' });
        }
      }
    });

    it.each(['geometry::Point', 'a::b::c::D', 'geometry/Point'])(
      'should reject the segment structure of %s',
      (typeString) => {
        const result = parseBaseType(typeString);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error).toMatchObject({ kind: 'ResourceNameError', name: typeString });
        }
      }
    );

    it('should name an invalid package token', () => {
      const result = parseBaseType('Geometry::msg::Point');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ kind: 'ResourceNameError', name: 'Geometry' });
      }
    });

    it('should name an invalid message token', () => {
      const result = parseBaseType('geometry::msg::point');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ kind: 'ResourceNameError', name: 'point' });
        expect(result.error.message).toBe("invalid message name 'point' in type 'geometry::msg::point'");
      }
    });

    it('should accept lowercase message names in relaxed mode', () => {
      const result = parseBaseType('geometry::msg::point', { naming: 'relaxed' });
      expect(result.success).toBe(true);
    });
  });

  describe('isPrimitive', () => {
    it('should hold exactly when there is no package name', () => {
      expect(isPrimitive(unwrapResult(parseBaseType('int8')))).toBe(true);
      expect(isPrimitive(unwrapResult(parseBaseType('string<=4')))).toBe(true);
      expect(isPrimitive(unwrapResult(parseBaseType('geometry::msg::Point')))).toBe(false);
    });
  });

  describe('rendering', () => {
    it('should render references as package/Type', () => {
      expect(renderBaseType(unwrapResult(parseBaseType('geometry::msg::Point')))).toBe('geometry/Point');
    });

    it('should format references as the qualified triple', () => {
      expect(formatBaseType(unwrapResult(parseBaseType('geometry::msg::Point')))).toBe(
        'geometry::msg::Point'
      );
    });

    it('should render bounded strings with their bound', () => {
      expect(renderBaseType(unwrapResult(parseBaseType('string<=7')))).toBe('string<=7');
      expect(formatBaseType(unwrapResult(parseBaseType('string<=7')))).toBe('string<=7');
    });
  });

  describe('identity', () => {
    const point = unwrapResult(parseBaseType('geometry::msg::Point'));

    it('should compare package, type name and string bound', () => {
      expect(baseTypeEquals(point, unwrapResult(parseBaseType('geometry::msg::Point')))).toBe(true);
      expect(baseTypeEquals(point, unwrapResult(parseBaseType('other::msg::Point')))).toBe(false);
      expect(
        baseTypeEquals(unwrapResult(parseBaseType('string<=3')), unwrapResult(parseBaseType('string')))
      ).toBe(false);
    });

    it('should ignore the namespace', () => {
      expect(baseTypeEquals(point, unwrapResult(parseBaseType('geometry::srv::Point')))).toBe(true);
      expect(baseTypeKey(point)).toBe(baseTypeKey(unwrapResult(parseBaseType('geometry::srv::Point'))));
    });

    it('should distinguish a primitive name from a reference of the same spelling', () => {
      const reference = unwrapResult(parseBaseType('pkg::msg::String', { naming: 'relaxed' }));
      const primitive = unwrapResult(parseBaseType('string'));
      expect(baseTypeKey(reference)).not.toBe(baseTypeKey(primitive));
    });
  });

  describe('BaseTypeSet', () => {
    it('should look up members structurally', () => {
      const set = new BaseTypeSet([
        unwrapResult(parseBaseType('geometry::msg::Point')),
        unwrapResult(parseBaseType('geometry::msg::Point')),
        unwrapResult(parseBaseType('geometry::msg::Pose')),
      ]);

      expect(set.size).toBe(2);
      expect(set.has(unwrapResult(parseBaseType('geometry::msg::Pose')))).toBe(true);
      expect(set.has(unwrapResult(parseBaseType('geometry::msg::Twist')))).toBe(false);
      expect([...set].map(renderBaseType)).toEqual(['geometry/Point', 'geometry/Pose']);
    });
  });

  describe('parsePositiveInteger', () => {
    it('should accept plain positive decimals only', () => {
      expect(parsePositiveInteger('12')).toBe(12);
      expect(parsePositiveInteger('0')).toBeUndefined();
      expect(parsePositiveInteger('+1')).toBeUndefined();
      expect(parsePositiveInteger(' 1')).toBeUndefined();
      expect(parsePositiveInteger('')).toBeUndefined();
      expect(parsePositiveInteger('99999999999999999999')).toBeUndefined();
    });
  });

  describe('isPrimitiveTypeName', () => {
    it('should require an exact table match', () => {
      expect(isPrimitiveTypeName('long double')).toBe(true);
      expect(isPrimitiveTypeName('long  double')).toBe(false);
      expect(isPrimitiveTypeName('Int32')).toBe(false);
    });
  });
});
