import { describe, it, expect } from 'vitest';

import { JSONValue } from '../../value/json-value.js';
import { AdditionalProperties } from '../additional-properties.js';
import {
  JSONSchema,
  isNeverSchema,
  isTypedSchema,
  schemaEquals,
} from '../json-schema.js';
import { customStringFormat } from '../string-format.js';

describe('JSONSchema builders', () => {
  it('omits unset fields', () => {
    const schema = JSONSchema.string({ minLength: 1, maxLength: undefined });
    expect(Object.keys(schema).sort()).toEqual(['kind', 'minLength']);
    expect(Object.isFrozen(schema)).toBe(true);
  });

  it('defaults object properties and required to empty', () => {
    const schema = JSONSchema.object();
    expect(schema.properties.size).toBe(0);
    expect(schema.required).toEqual([]);
    expect(schema.additionalProperties).toBeUndefined();
  });

  it('keeps property insertion order from every init form', () => {
    const fromRecord = JSONSchema.object({
      properties: { zebra: JSONSchema.string(), apple: JSONSchema.integer() },
    });
    const fromEntries = JSONSchema.object({
      properties: [
        ['zebra', JSONSchema.string()],
        ['apple', JSONSchema.integer()],
      ],
    });
    expect([...fromRecord.properties.keys()]).toEqual(['zebra', 'apple']);
    expect(schemaEquals(fromRecord, fromEntries)).toBe(true);
  });

  it('wraps boolean additionalProperties', () => {
    expect(JSONSchema.object({ additionalProperties: false }).additionalProperties).toEqual({
      kind: 'boolean',
      value: false,
    });
    const typed = JSONSchema.object({
      additionalProperties: AdditionalProperties.schema(JSONSchema.string()),
    });
    expect(typed.additionalProperties?.kind).toBe('schema');
  });

  it('maps not(any) onto the never schema', () => {
    expect(JSONSchema.not(JSONSchema.any)).toBe(JSONSchema.never);
    expect(isNeverSchema(JSONSchema.never)).toBe(true);
    expect(isNeverSchema(JSONSchema.not(JSONSchema.string()))).toBe(false);
  });

  it('classifies typed variants', () => {
    expect(isTypedSchema(JSONSchema.boolean())).toBe(true);
    expect(isTypedSchema(JSONSchema.null)).toBe(false);
    expect(isTypedSchema(JSONSchema.ref('#/a'))).toBe(false);
  });
});

describe('schemaEquals', () => {
  it('compares properties in order', () => {
    const ab = JSONSchema.object({
      properties: [
        ['a', JSONSchema.string()],
        ['b', JSONSchema.string()],
      ],
    });
    const ba = JSONSchema.object({
      properties: [
        ['b', JSONSchema.string()],
        ['a', JSONSchema.string()],
      ],
    });
    expect(schemaEquals(ab, ba)).toBe(false);
    expect(schemaEquals(ab, JSONSchema.object({ properties: new Map(ab.properties) }))).toBe(true);
  });

  it('compares metadata with JSON value equality', () => {
    const left = JSONSchema.integer({
      default: JSONValue.object({ a: JSONValue.int(1), b: JSONValue.int(2) }),
    });
    const right = JSONSchema.integer({
      default: JSONValue.object([
        ['b', JSONValue.int(2)],
        ['a', JSONValue.int(1)],
      ]),
    });
    expect(schemaEquals(left, right)).toBe(true);
    expect(
      schemaEquals(
        JSONSchema.integer({ const: JSONValue.int(1) }),
        JSONSchema.integer({ const: JSONValue.double(1) })
      )
    ).toBe(false);
  });

  it('distinguishes variants and keywords', () => {
    expect(schemaEquals(JSONSchema.number(), JSONSchema.integer())).toBe(false);
    expect(schemaEquals(JSONSchema.anyOf([JSONSchema.any]), JSONSchema.oneOf([JSONSchema.any]))).toBe(
      false
    );
    expect(schemaEquals(JSONSchema.number({ minimum: 1 }), JSONSchema.number({ minimum: 2 }))).toBe(
      false
    );
    expect(schemaEquals(JSONSchema.empty, JSONSchema.any)).toBe(false);
  });

  it('treats a custom format with a standard name as different', () => {
    expect(
      schemaEquals(
        JSONSchema.string({ format: 'uuid' }),
        JSONSchema.string({ format: customStringFormat('uuid') })
      )
    ).toBe(false);
  });
});
