// packages/shape/src/schema-inference.ts
import type { JsonValue, PermissiveSchema, PropertySchema, Row, SchemaType } from '@rowsmith/core';
import { jsonKind } from '@rowsmith/core';

export const SCHEMA_DIALECT = 'https://json-schema.org/draft/2020-12/schema';

export function schemaTypeOf(v: JsonValue): SchemaType {
  const kind = jsonKind(v);
  if (kind === 'number') return Number.isInteger(v) ? 'integer' : 'number';
  return kind;
}

// Observes types only; never emits `required`, always allows extra fields.
export function inferSchema(rows: readonly Row[]): PermissiveSchema {
  const seen = new Map<string, SchemaType[]>();
  for (const row of rows) {
    for (const [key, value] of Object.entries(row)) {
      const t = schemaTypeOf(value);
      const types = seen.get(key);
      if (!types) seen.set(key, [t]);
      else if (!types.includes(t)) types.push(t);
    }
  }

  const properties: Record<string, PropertySchema> = Object.fromEntries(
    [...seen].map(([key, types]): [string, PropertySchema] => [key, { type: types.length === 1 ? types[0] : types }])
  );

  return {
    $schema: SCHEMA_DIALECT,
    type: 'array',
    items: { type: 'object', properties, additionalProperties: true }
  };
}
