// packages/engine/src/fields.ts
import type { FieldResolution, Row } from '@rowsmith/core';
import { getAt, parsePointer } from '@rowsmith/core';
import { resolveField } from '@rowsmith/shape';
import type { Value } from './values.js';
import { MISSING } from './values.js';

// per-row resolution, used by filter operands and expressions
export function readField(ref: string, row: Row): Value {
  const res = resolveField(ref, row);
  if (!res.wasResolved) return MISSING;
  const v = getAt(row, parsePointer(res.resolvedPath));
  return v === undefined ? MISSING : v;
}

export interface FieldReader {
  resolution: FieldResolution;
  read(row: Row): Value;
}

// Resolve once against the step's sample row, then fall back to the row
// itself when the sampled path is absent there (heterogeneous rows).
export function fieldReader(ref: string, sample: Row): FieldReader {
  const resolution = resolveField(ref, sample);
  const segments = resolution.wasResolved ? parsePointer(resolution.resolvedPath) : null;
  return {
    resolution,
    read(row) {
      const v = segments ? getAt(row, segments) : undefined;
      return v === undefined ? readField(ref, row) : v;
    }
  };
}
