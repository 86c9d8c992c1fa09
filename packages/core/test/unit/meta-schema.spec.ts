import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { Ajv2020 } from 'ajv/dist/2020.js';

import { decodeSchema } from '../../src/schema/decoder.js';
import { encodeSchema } from '../../src/schema/encoder.js';
import { JSONSchema } from '../../src/schema/json-schema.js';
import { metaSchemaValidSchemaArbitrary } from '../fixtures/arbitraries.js';

// Formats stay annotations: `pattern` and `$ref` values are arbitrary text here
function createAjv(): Ajv2020 {
  return new Ajv2020({ strict: false, validateFormats: false, logger: false });
}

describe('encoded schemas against the 2020-12 meta-schema', () => {
  it('accepts every encoded schema', () => {
    const ajv = createAjv();
    fc.assert(
      fc.property(metaSchemaValidSchemaArbitrary, (schema) => {
        expect(ajv.validateSchema(JSON.parse(encodeSchema(schema)))).toBe(true);
      }),
      { seed: 202_610, numRuns: 100 }
    );
  });

  it('validates instances the way the source schema does', () => {
    const source = `{
      "type": "object",
      "properties": {
        "name": {"type": "string", "minLength": 1},
        "tags": {"type": "array", "items": {"type": "string"}, "uniqueItems": true}
      },
      "required": ["name"],
      "additionalProperties": false
    }`;
    const schema = decodeSchema(source).unwrap();
    const ajv = createAjv();
    const validate = ajv.compile(JSON.parse(encodeSchema(schema)));

    expect(validate({ name: 'widget', tags: ['a', 'b'] })).toBe(true);
    expect(validate({ name: '' })).toBe(false);
    expect(validate({ name: 'widget', extra: 1 })).toBe(false);
    expect(validate({ tags: [] })).toBe(false);
  });

  it('rejects an empty composite list', () => {
    const ajv = createAjv();
    expect(ajv.validateSchema(JSON.parse(encodeSchema(JSONSchema.anyOf([]))))).toBe(false);
  });

  it('treats the never schema as false', () => {
    const ajv = createAjv();
    const validate = ajv.compile(JSON.parse(encodeSchema(JSONSchema.never)));
    expect(validate(null)).toBe(false);
  });
});
