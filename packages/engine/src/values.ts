// packages/engine/src/values.ts
// Value semantics shared by the expression interpreter, condition trees,
// sort and aggregate.
import type { CompareOp, JsonValue } from '@rowsmith/core';
import { foldText, jsonEquals, jsonKind, toNumber } from '@rowsmith/core';

// a field that could not be resolved on the current row
export const MISSING: unique symbol = Symbol('missing');
export type Missing = typeof MISSING;
export type Value = JsonValue | Missing;

// three-valued truth; 'unknown' comes from unresolved fields
export type Tri = boolean | 'unknown';

export function isMissing(v: Value): v is Missing {
  return v === MISSING;
}

export function orNull(v: Value): JsonValue {
  return isMissing(v) ? null : v;
}

// null, 0 and '' are false; containers are true
export function truth(v: Value): Tri {
  if (isMissing(v)) return 'unknown';
  switch (jsonKind(v)) {
    case 'null': return false;
    case 'boolean': return v === true;
    case 'number': return v !== 0;
    case 'string': return v !== '';
    case 'array':
    case 'object': return true;
  }
}

export function triToValue(t: Tri): Value {
  return t === 'unknown' ? MISSING : t;
}

export function triNot(t: Tri): Tri {
  return t === 'unknown' ? t : !t;
}

export function triAnd(a: Tri, b: Tri): Tri {
  if (a === false || b === false) return false;
  if (a === true && b === true) return true;
  return 'unknown';
}

export function triOr(a: Tri, b: Tri): Tri {
  if (a === true || b === true) return true;
  if (a === false && b === false) return false;
  return 'unknown';
}

// -1 / 0 / 1, or null when the pair has no order
function order(a: JsonValue, b: JsonValue): number | null {
  if (typeof a === 'number' || typeof b === 'number') {
    const x = toNumber(a);
    const y = toNumber(b);
    if (x === null || y === null) return null;
    return Math.sign(x - y);
  }
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return null;
}

function equal(a: JsonValue, b: JsonValue): boolean {
  if (typeof a === 'number' || typeof b === 'number') {
    const o = order(a, b);
    return o === 0;
  }
  return jsonEquals(a, b);
}

function contains(hay: JsonValue, needle: JsonValue): boolean {
  if (Array.isArray(hay)) return hay.some(x => equal(x, needle));
  if (typeof hay === 'string' && typeof needle === 'string') {
    return foldText(hay).includes(foldText(needle));
  }
  return false;
}

export function compareValues(op: CompareOp, left: Value, right: Value): Tri {
  if (isMissing(left) || isMissing(right)) return 'unknown';
  switch (op) {
    case 'eq': return equal(left, right);
    case 'neq': return !equal(left, right);
    case 'in': return Array.isArray(right) && right.some(x => equal(left, x));
    case 'contains': return contains(left, right);
    default: {
      const o = order(left, right);
      if (o === null) return false;
      if (op === 'gt') return o > 0;
      if (op === 'gte') return o >= 0;
      if (op === 'lt') return o < 0;
      return o <= 0;
    }
  }
}

// sort comparator rank: numbers, strings, booleans; everything else sorts last
export function sortClass(v: Value): number {
  if (isMissing(v)) return 3;
  switch (typeof v) {
    case 'number': return 0;
    case 'string': return 1;
    case 'boolean': return 2;
    default: return 3;
  }
}

export function sortCompare(a: Value, b: Value, desc: boolean): number {
  const ca = sortClass(a);
  const cb = sortClass(b);
  if (ca === 3 || cb === 3) return (ca === 3 ? 1 : 0) - (cb === 3 ? 1 : 0);
  if (ca !== cb) return ca - cb;
  if (isMissing(a) || isMissing(b)) return 0;
  const o = order(a, b) ?? 0;
  return desc ? -o : o;
}
