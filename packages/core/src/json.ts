// JSON value helpers shared by every package. All of them treat their
// inputs as immutable.
import type { JsonKind, JsonObject, JsonValue, Row } from './types.js';

export function jsonKind(v: JsonValue): JsonKind {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  switch (typeof v) {
    case 'boolean': return 'boolean';
    case 'number': return 'number';
    case 'string': return 'string';
    default: return 'object';
  }
}

export function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return v !== null && v !== undefined && typeof v === 'object' && !Array.isArray(v);
}

export function hasField(obj: JsonObject, key: string): boolean {
  return Object.hasOwn(obj, key);
}

export function fieldOf(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(obj, key) ? obj[key] : undefined;
}

// fromEntries defines own properties, so keys like "__proto__" stay data
export function rowFrom(entries: Iterable<readonly [string, JsonValue]>): Row {
  return Object.fromEntries(entries);
}

export function withField(row: Row, key: string, value: JsonValue): Row {
  return rowFrom([...Object.entries(row), [key, value]]);
}

export const EMPTY_ROW: Row = Object.freeze(rowFrom([]));

// ---------- JSON pointers ----------
// "/" and "" both address the root. Bare names are a single segment.
export function parsePointer(path: string): string[] {
  if (!path.startsWith('/')) return path ? [path] : [];
  return path
    .slice(1)
    .split('/')
    .filter(s => s.length > 0)
    .map(s => s.replace(/~1/g, '/').replace(/~0/g, '~'));
}

export function formatPointer(segments: readonly string[]): string {
  if (segments.length === 0) return '/';
  return '/' + segments.map(s => s.replace(/~/g, '~0').replace(/\//g, '~1')).join('/');
}

export function getAt(value: JsonValue, segments: readonly string[]): JsonValue | undefined {
  let cur: JsonValue | undefined = value;
  for (const seg of segments) {
    if (cur === undefined) return undefined;
    if (Array.isArray(cur)) {
      if (!/^\d+$/.test(seg)) return undefined;
      cur = cur[Number(seg)];
    } else if (isJsonObject(cur)) {
      cur = fieldOf(cur, seg);
    } else {
      return undefined;
    }
  }
  return cur;
}

// ---------- comparisons ----------
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  const ka = jsonKind(a);
  if (ka !== jsonKind(b)) return false;
  if (ka === 'array' && Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => jsonEquals(x, b[i]));
  }
  if (ka === 'object' && isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(k => hasField(b, k) && jsonEquals(a[k], b[k]));
  }
  return false;
}

// key-order independent serialization; used for grouping tuples
export function canonicalJson(v: JsonValue): string {
  switch (jsonKind(v)) {
    case 'array':
      return Array.isArray(v) ? `[${v.map(canonicalJson).join(',')}]` : '';
    case 'object': {
      if (!isJsonObject(v)) return '';
      const keys = Object.keys(v).sort();
      return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(v[k])}`).join(',')}}`;
    }
    default:
      return JSON.stringify(v);
  }
}

// numbers and numeric strings; everything else is not a number
export function toNumber(v: JsonValue | undefined): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// lower-case + strip combining marks ("Preço" -> "preco")
export function foldText(s: string): string {
  return s.normalize('NFD').replace(/\p{M}+/gu, '').toLowerCase();
}
