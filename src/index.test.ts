import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  formatType,
  parseMessageSpecification,
  parseType,
  renderConstant,
  renderField,
  unwrapResult,
  validateFieldTypes,
  VERSION,
} from './index.js';

describe('idl-typemodel', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });
  });

  describe('end to end', () => {
    const spec = unwrapResult(
      parseMessageSpecification({
        packageName: 'fleet',
        namespace: 'msg',
        messageName: 'Vehicle',
        fields: [
          { type: 'string<=8', name: 'callsign', defaultValue: '"alpha"' },
          { type: 'int32[2]', name: 'position', defaultValue: '[-4, 17]' },
          { type: 'string[]', name: 'tags', defaultValue: "['a,b', \"c\"]" },
          { type: 'Driver[<=2]', name: 'drivers' },
        ],
        constants: [{ type: 'int32', name: 'MAX_SPEED', value: '100' }],
      })
    );

    it('should render constants and fields back to declarations', () => {
      expect(spec.constants.map(renderConstant)).toEqual(['int32 MAX_SPEED=100']);
      expect(spec.fields.map(renderField)).toEqual([
        "string<=8 callsign 'alpha'",
        'int32[2] position [-4, 17]',
        "string[] tags ['a,b', 'c']",
        'fleet/Driver[<=2] drivers',
      ]);
    });

    it('should resolve references only against known types', () => {
      const driver = parseType('fleet::msg::Driver');
      expect(driver.success).toBe(true);
      if (driver.success) {
        expect(validateFieldTypes(spec, [driver.value]).success).toBe(true);
      }
      expect(validateFieldTypes(spec, []).success).toBe(false);
    });
  });

  describe('property-based tests', () => {
    it('should round-trip fixed and bounded primitive array types', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('int8', 'uint64', 'float32', 'bool', 'string<=5'),
          fc.integer({ min: 1, max: 1000 }),
          fc.boolean(),
          (base, size, bounded) => {
            const text = `${base}[${bounded ? '<=' : ''}${String(size)}]`;
            return formatType(unwrapResult(parseType(text))) === text;
          }
        )
      );
    });
  });
});
