// packages/shape/src/normalize.ts
import type { JsonValue, Row, TransformFailure } from '@rowsmith/core';
import { EMPTY_ROW, Errors, getAt, isJsonObject, jsonKind, parsePointer, rowFrom } from '@rowsmith/core';

export type NormalizationResult =
  | { success: true; rows: Row[]; sampleRow: Row; warnings: string[] }
  | { success: false; error: TransformFailure };

function ok(rows: Row[], warnings: string[]): NormalizationResult {
  return { success: true, rows, sampleRow: rows[0] ?? EMPTY_ROW, warnings };
}

/**
 * Turns the value found at the record path into a row sequence.
 * - array: one row per element (objects copied, other values wrapped as {value}, nulls skipped)
 * - object: a single row
 * - null / absent: no rows
 */
export function normalizeValue(value: JsonValue | undefined): NormalizationResult {
  if (value === undefined || value === null) return ok([], []);

  if (isJsonObject(value)) return ok([rowFrom(Object.entries(value))], []);

  if (!Array.isArray(value)) return { success: false, error: Errors.WRONG_SHAPE(jsonKind(value)) };

  const rows: Row[] = [];
  let wrapped = 0;
  let skipped = 0;
  for (const el of value) {
    if (el === null) { skipped++; continue; }
    if (isJsonObject(el)) {
      rows.push(rowFrom(Object.entries(el)));
    } else {
      wrapped++;
      rows.push(rowFrom([['value', el]]));
    }
  }

  const warnings: string[] = [];
  if (wrapped) warnings.push(`${wrapped} non-object element(s) wrapped as {"value": ...}`);
  if (skipped) warnings.push(`${skipped} null element(s) skipped`);
  return ok(rows, warnings);
}

export function extractAndNormalize(document: JsonValue, recordPath: string): NormalizationResult {
  const target = getAt(document, parsePointer(recordPath));
  if (target === undefined) return { success: false, error: Errors.RECORD_PATH_NOT_FOUND(recordPath) };
  return normalizeValue(target);
}

export function normalize(document: JsonValue | undefined, recordPath?: string): NormalizationResult {
  if (recordPath === undefined || document === undefined) return normalizeValue(document);
  return extractAndNormalize(document, recordPath);
}
