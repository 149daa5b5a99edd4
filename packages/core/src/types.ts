// --------------------
// JSON values
// --------------------
export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

// A row is an object whose key order is the output column order.
export type Row = JsonObject;

// --------------------
// Conditions / operands
// --------------------
// Same comparison vocabulary as the expression language; 'in' and
// 'contains' are only reachable from condition trees.
export type CompareOp =
  | 'eq' | 'neq'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'in'
  | 'contains';

export interface FieldOperand {
  field: string;
}

export type Operand = FieldOperand | JsonValue;

export type Condition =
  | { op: CompareOp; left: Operand; right: Operand }
  | { op: 'and' | 'or'; items: Condition[] }
  | { op: 'not'; items: Condition[] };

// --------------------
// Discovery
// --------------------
export interface RecordPathCandidate {
  path: string;
  arrayLength: number;
  objectFieldCount: number; // distinct keys over the first object items, 0 for primitives
  hasObjectItems: boolean;
  depth: number;            // 0 for the root array
  score: number;
}

// --------------------
// Field resolution
// --------------------
export type ResolutionVia = 'exact' | 'case' | 'alias' | 'convention' | 'none';

export interface FieldResolution {
  originalField: string;
  resolvedField: string;  // last segment actually matched (or the requested one)
  resolvedPath: string;   // pointer form, e.g. "/address/city"
  wasResolved: boolean;
  via: ResolutionVia;
  warnings: string[];
}

// --------------------
// Output schema (permissive JSON Schema subset)
// --------------------
export type SchemaType = 'string' | 'integer' | 'number' | 'boolean' | 'null' | 'array' | 'object';

export interface PropertySchema {
  type: SchemaType | SchemaType[];
}

export interface PermissiveSchema {
  $schema: string;
  type: 'array';
  items: {
    type: 'object';
    properties: Record<string, PropertySchema>;
    additionalProperties: true;
  };
}
