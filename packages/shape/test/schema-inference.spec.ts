/* packages/shape/test/schema-inference.spec.ts */
import { describe, it, expect } from 'vitest';
import { inferSchema, SCHEMA_DIALECT } from '../src/index.js';

describe('inferSchema', () => {
  it('records every observed type in first-seen order', () => {
    const schema = inferSchema([
      { a: 1, b: 'x', tags: ['t'] },
      { a: 1.5, c: null, meta: { k: true } },
      { a: 2, b: false }
    ]);
    expect(schema.$schema).toBe(SCHEMA_DIALECT);
    expect(schema.items.properties).toEqual({
      a: { type: ['integer', 'number'] },
      b: { type: ['string', 'boolean'] },
      tags: { type: 'array' },
      c: { type: 'null' },
      meta: { type: 'object' }
    });
  });

  it('stays permissive', () => {
    const schema = inferSchema([]);
    expect(schema).toEqual({
      $schema: 'https://json-schema.org/draft/2020-12/schema',
      type: 'array',
      items: { type: 'object', properties: {}, additionalProperties: true }
    });
    expect('required' in schema.items).toBe(false);
  });
});
