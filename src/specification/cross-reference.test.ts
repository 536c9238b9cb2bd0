import { describe, expect, it } from 'vitest';
import { unwrapResult } from '../errors/index.js';
import { BaseTypeSet, parseBaseType } from '../type-model/index.js';
import {
  parseMessageSpecification,
  parseServiceSpecification,
  renderSpecificationName,
  specificationFields,
  validateFieldTypes,
} from './index.js';

const baseType = (typeString: string) => unwrapResult(parseBaseType(typeString));

const route = unwrapResult(
  parseMessageSpecification({
    packageName: 'nav',
    namespace: 'msg',
    messageName: 'Route',
    fields: [
      { type: 'string', name: 'label' },
      { type: 'Waypoint[]', name: 'waypoints' },
      { type: 'geo::msg::Origin', name: 'origin' },
    ],
    constants: [],
  })
);

const plan = unwrapResult(
  parseServiceSpecification({
    packageName: 'nav',
    namespace: 'srv',
    serviceName: 'Plan',
    request: { fields: [{ type: 'nav::msg::Route', name: 'route' }], constants: [] },
    response: { fields: [{ type: 'bool', name: 'accepted' }, { type: 'geo::msg::Origin', name: 'origin' }], constants: [] },
  })
);

describe('validateFieldTypes', () => {
  it('should accept a message whose references are all known', () => {
    const result = validateFieldTypes(route, [baseType('nav::msg::Waypoint'), baseType('geo::msg::Origin')]);
    expect(result).toEqual({ success: true, value: undefined });
  });

  it('should report the first unknown reference', () => {
    const result = validateFieldTypes(route, [baseType('nav::msg::Waypoint')]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toEqual({
        kind: 'SpecificationError',
        reason: 'unknown_field_type',
        message: "Message interface 'nav/Route' contains an unknown field type: geo/Origin origin",
        names: ['nav/Route', 'geo/Origin origin'],
      });
    }
  });

  it('should render array suffixes of unknown fields', () => {
    const result = validateFieldTypes(route, []);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Message interface 'nav/Route' contains an unknown field type: nav/Waypoint[] waypoints"
      );
    }
  });

  it('should match references regardless of namespace', () => {
    const result = validateFieldTypes(route, [baseType('nav::action::Waypoint'), baseType('geo::srv::Origin')]);
    expect(result.success).toBe(true);
  });

  it('should accept a prebuilt set', () => {
    const known = new BaseTypeSet([baseType('nav::msg::Waypoint'), baseType('geo::msg::Origin')]);
    expect(validateFieldTypes(route, known).success).toBe(true);
  });

  it('should check service request fields then response fields', () => {
    const result = validateFieldTypes(plan, [baseType('nav::msg::Route')]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Service interface 'nav/Plan' contains an unknown field type: geo/Origin origin"
      );
    }
  });

  it('should ignore primitive fields', () => {
    expect(validateFieldTypes(plan, [baseType('nav::msg::Route'), baseType('geo::msg::Origin')]).success).toBe(
      true
    );
  });
});

describe('specificationFields', () => {
  it('should list service request fields before response fields', () => {
    expect(specificationFields(plan).map((f) => f.name)).toEqual(['route', 'accepted', 'origin']);
    expect(specificationFields(route).map((f) => f.name)).toEqual(['label', 'waypoints', 'origin']);
  });
});

describe('renderSpecificationName', () => {
  it('should render package and name', () => {
    expect(renderSpecificationName(route)).toBe('nav/Route');
    expect(renderSpecificationName(plan)).toBe('nav/Plan');
  });
});
