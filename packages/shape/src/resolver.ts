// packages/shape/src/resolver.ts
// Map a user/model supplied field reference onto the keys a sample row
// actually has. Never throws; an unresolved reference comes back unchanged.
import type { FieldResolution, JsonObject, JsonValue, ResolutionVia } from '@rowsmith/core';
import { fieldOf, foldText, formatPointer, isJsonObject, parsePointer } from '@rowsmith/core';
import { aliasIndex } from './data.js';

// weakest link decides how a multi-segment match is reported
const STRENGTH: Record<ResolutionVia, number> = { exact: 0, case: 1, alias: 2, convention: 3, none: 4 };

// "unitPrice", "unit_price" and "Unit-Price" all become "unitprice"
export function conventionKey(name: string): string {
  return foldText(name).replace(/[^\p{L}\p{N}]+/gu, '');
}

// "unitPrice" -> "unit price", "unit_price" -> "unit price"
export function spokenForm(name: string): string {
  return foldText(name.replace(/(\p{Ll}|\p{N})(\p{Lu})/gu, '$1 $2'))
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .join(' ');
}

export function matchKey(obj: JsonObject, wanted: string): { key: string; via: ResolutionVia } | null {
  if (Object.hasOwn(obj, wanted)) return { key: wanted, via: 'exact' };

  const keys = Object.keys(obj);
  const folded = foldText(wanted);
  const byCase = keys.find(k => foldText(k) === folded);
  if (byCase !== undefined) return { key: byCase, via: 'case' };

  const aliases = aliasIndex().get(folded);
  if (aliases) {
    const byAlias = keys.find(k => aliases.has(foldText(k)));
    if (byAlias !== undefined) return { key: byAlias, via: 'alias' };
  }

  const conv = conventionKey(wanted);
  if (conv) {
    const byConv = keys.find(k => conventionKey(k) === conv);
    if (byConv !== undefined) return { key: byConv, via: 'convention' };
  }
  return null;
}

function unresolved(reference: string, segments: string[], warning: string): FieldResolution {
  return {
    originalField: reference,
    resolvedField: segments.at(-1) ?? reference,
    resolvedPath: segments.length ? formatPointer(segments) : reference,
    wasResolved: false,
    via: 'none',
    warnings: [warning]
  };
}

export function resolveField(reference: string, sampleRow: JsonObject): FieldResolution {
  const segments = parsePointer(reference);
  if (segments.length === 0) return unresolved(reference, segments, `Empty field reference '${reference}'`);

  let cur: JsonValue | undefined = sampleRow;
  let via: ResolutionVia = 'exact';
  const matched: string[] = [];
  for (const seg of segments) {
    if (!isJsonObject(cur)) {
      return unresolved(reference, segments, `Field '${reference}' not found: '${formatPointer(matched)}' is not an object`);
    }
    const hit = matchKey(cur, seg);
    if (!hit) return unresolved(reference, segments, `Field '${reference}' not found in sample row`);
    matched.push(hit.key);
    if (STRENGTH[hit.via] > STRENGTH[via]) via = hit.via;
    cur = fieldOf(cur, hit.key);
  }

  const resolvedPath = formatPointer(matched);
  return {
    originalField: reference,
    resolvedField: matched[matched.length - 1] ?? reference,
    resolvedPath,
    wasResolved: true,
    via,
    warnings: via === 'exact' ? [] : [`Field '${reference}' resolved to '${resolvedPath}' (${via})`]
  };
}
