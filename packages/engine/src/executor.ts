// packages/engine/src/executor.ts
// Plan executor: validate, extract rows, fold steps left to right.
import type {
  ExecutionTrace, JsonValue, MetricSpec, PlanStep, Row, StepOf, StepTrace, TransformFailure, TransformPlan
} from '@rowsmith/core';
import { EMPTY_ROW, Errors, canonicalJson, rowFrom, toNumber, withField } from '@rowsmith/core';
import { extractAndNormalize } from '@rowsmith/shape';
import { parseExpression } from './expr/parser.js';
import { evaluate } from './expr/interp.js';
import { evalCondition } from './conditions.js';
import { fieldReader } from './fields.js';
import type { PlanLimits } from './validate.js';
import { DEFAULT_LIMITS, validatePlan } from './validate.js';
import type { Tri, Value } from './values.js';
import { isMissing, orNull, sortCompare, truth } from './values.js';

export type ExecuteOptions = Partial<PlanLimits>;

export type ExecutionResult =
  | { success: true; plan: TransformPlan; rows: Row[]; warnings: string[]; trace: ExecutionTrace }
  | { success: false; error: TransformFailure; warnings: string[] };

interface Group {
  keys: Row;
  rows: Row[];
}

interface State {
  rows: Row[];
  groups: Group[] | null; // set by groupBy, consumed by the next aggregate
  warnings: string[];
}

const sampleOf = (rows: Row[]): Row => rows[0] ?? EMPTY_ROW;

function round3(ms: number) {
  return Math.round(ms * 1000) / 1000;
}

// ---------- steps ----------
function runSelect(step: StepOf<'select'>, s: State, at: string): State {
  const sample = sampleOf(s.rows);
  const readers = step.fields.map(f => ({ as: f.as, reader: fieldReader(f.from, sample) }));
  if (s.rows.length) {
    for (const { reader } of readers) s.warnings.push(...reader.resolution.warnings.map(w => `${at}: ${w}`));
  }
  const rows = s.rows.map(row => rowFrom(readers.map(({ as, reader }): [string, JsonValue] => [as, orNull(reader.read(row))])));
  return { ...s, rows };
}

function runFilter(step: StepOf<'filter'>, s: State, at: string): State {
  const where = step.where;
  let test: (row: Row) => Tri;
  if (typeof where === 'string') {
    const expr = parseExpression(where);
    test = row => truth(evaluate(expr, row));
  } else {
    test = row => evalCondition(where, row);
  }

  let unknown = 0;
  const rows = s.rows.filter(row => {
    const t = test(row);
    if (t === 'unknown') unknown++;
    return t === true;
  });
  if (unknown) s.warnings.push(`${at}: ${unknown} row(s) dropped because a referenced field could not be resolved`);
  return { ...s, rows };
}

function runCompute(step: StepOf<'compute'>, s: State, at: string): State {
  const specs = step.compute.map(c => ({ as: c.as, expr: parseExpression(c.expr), unknown: 0 }));
  const rows = s.rows.map(row => {
    let out = row;
    // later specs see earlier results
    for (const spec of specs) {
      const v = evaluate(spec.expr, out);
      if (isMissing(v)) spec.unknown++;
      out = withField(out, spec.as, orNull(v));
    }
    return out;
  });
  for (const spec of specs) {
    if (spec.unknown) s.warnings.push(`${at}: '${spec.as}' is null on ${spec.unknown} row(s) with unresolved fields`);
  }
  return { ...s, rows };
}

// mapping keys are the string form of the source value
function mappingKey(v: JsonValue): string {
  if (typeof v === 'string') return v;
  if (v !== null && typeof v === 'object') return canonicalJson(v);
  return String(v);
}

function runMapValue(step: StepOf<'mapValue'>, s: State, at: string): State {
  const sample = sampleOf(s.rows);
  const specs = step.map.map(m => ({ spec: m, reader: fieldReader(m.from, sample) }));
  if (s.rows.length) {
    for (const { reader } of specs) s.warnings.push(...reader.resolution.warnings.map(w => `${at}: ${w}`));
  }
  const rows = s.rows.map(row => specs.reduce((out, { spec, reader }) => {
    const v = orNull(reader.read(row));
    const key = mappingKey(v);
    const fallback = spec.default !== undefined ? spec.default : v;
    const mapped = Object.hasOwn(spec.mapping, key) ? spec.mapping[key] : fallback;
    return withField(out, spec.as, mapped);
  }, row));
  return { ...s, rows };
}

function runSort(step: StepOf<'sort'>, s: State, at: string): State {
  const reader = fieldReader(step.by, sampleOf(s.rows));
  if (s.rows.length) s.warnings.push(...reader.resolution.warnings.map(w => `${at}: ${w}`));
  const desc = step.dir === 'desc';
  const rows = s.rows
    .map((row): { row: Row; key: Value } => ({ row, key: reader.read(row) }))
    .sort((a, b) => sortCompare(a.key, b.key, desc))
    .map(x => x.row);
  return { ...s, rows };
}

function runGroupBy(step: StepOf<'groupBy'>, s: State, at: string): State {
  const sample = sampleOf(s.rows);
  const keys = step.keys.map(k => {
    const reader = fieldReader(k, sample);
    return { column: reader.resolution.resolvedField, reader };
  });
  if (s.rows.length) {
    for (const { reader } of keys) s.warnings.push(...reader.resolution.warnings.map(w => `${at}: ${w}`));
  }

  const groups = new Map<string, Group>();
  for (const row of s.rows) {
    const tuple = keys.map(k => orNull(k.reader.read(row)));
    const id = canonicalJson(tuple);
    const g = groups.get(id);
    if (g) g.rows.push(row);
    else groups.set(id, { keys: rowFrom(keys.map((k, i): [string, JsonValue] => [k.column, tuple[i]])), rows: [row] });
  }
  return { ...s, groups: [...groups.values()] };
}

function metricValue(m: MetricSpec, rows: Row[], read: (row: Row) => Value): JsonValue {
  const numbers = () => {
    const out: number[] = [];
    for (const row of rows) {
      const v = read(row);
      const n = isMissing(v) ? null : toNumber(v);
      if (n !== null) out.push(n);
    }
    return out;
  };
  const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);

  switch (m.fn) {
    case 'count': return rows.length;
    case 'sum': return sum(numbers());
    case 'avg': {
      const xs = numbers();
      return xs.length ? sum(xs) / xs.length : null;
    }
    case 'min': {
      const xs = numbers();
      return xs.length ? xs.reduce((a, b) => (b < a ? b : a)) : null;
    }
    case 'max': {
      const xs = numbers();
      return xs.length ? xs.reduce((a, b) => (b > a ? b : a)) : null;
    }
  }
}

function runAggregate(step: StepOf<'aggregate'>, s: State, at: string): State {
  const sample = sampleOf(s.rows);
  const groups = s.groups ?? [{ keys: EMPTY_ROW, rows: s.rows }];

  const metrics = step.metrics.map(m => {
    if (m.expr) {
      const expr = parseExpression(m.expr);
      return { m, read: (row: Row) => evaluate(expr, row) };
    }
    if (m.field) {
      const reader = fieldReader(m.field, sample);
      if (s.rows.length) s.warnings.push(...reader.resolution.warnings.map(w => `${at}: ${w}`));
      return { m, read: (row: Row) => reader.read(row) };
    }
    return { m, read: (): Value => null };
  });

  const rows = groups.map(g => rowFrom([
    ...Object.entries(g.keys),
    ...metrics.map(({ m, read }): [string, JsonValue] => [m.as, metricValue(m, g.rows, read)])
  ]));
  return { rows, groups: null, warnings: s.warnings };
}

function runStep(step: PlanStep, s: State, at: string): State {
  switch (step.op) {
    case 'select': return runSelect(step, s, at);
    case 'filter': return runFilter(step, s, at);
    case 'compute': return runCompute(step, s, at);
    case 'mapValue': return runMapValue(step, s, at);
    case 'sort': return runSort(step, s, at);
    case 'groupBy': return runGroupBy(step, s, at);
    case 'aggregate': return runAggregate(step, s, at);
    case 'limit': return { ...s, rows: s.rows.slice(0, step.n) };
  }
}

function outputCount(s: State): number {
  return s.groups ? s.groups.length : s.rows.length;
}

// ---------- public ----------
export function execute(plan: unknown, document: JsonValue, options: ExecuteOptions = {}): ExecutionResult {
  const limits: PlanLimits = {
    maxRows: options.maxRows ?? DEFAULT_LIMITS.maxRows,
    maxSteps: options.maxSteps ?? DEFAULT_LIMITS.maxSteps
  };

  const validation = validatePlan(plan, limits);
  if (!validation.success) return { success: false, error: validation.error, warnings: [] };
  const valid = validation.plan;

  const extracted = extractAndNormalize(document, valid.source.recordPath);
  if (!extracted.success) return { success: false, error: extracted.error, warnings: [] };
  if (extracted.rows.length > limits.maxRows) {
    return {
      success: false,
      error: Errors.LIMIT_EXCEEDED('rows', extracted.rows.length, limits.maxRows),
      warnings: extracted.warnings
    };
  }

  let state: State = { rows: extracted.rows, groups: null, warnings: [...extracted.warnings] };
  const steps: StepTrace[] = [];
  valid.steps.forEach((step, index) => {
    const inputRows = state.rows.length;
    const t0 = performance.now();
    state = runStep(step, state, `steps[${index}] ${step.op}`);
    steps.push({ index, op: step.op, inputRows, outputRows: outputCount(state), ms: round3(performance.now() - t0) });
  });

  return {
    success: true,
    plan: valid,
    rows: state.rows,
    warnings: state.warnings,
    trace: { recordPath: valid.source.recordPath, extractedRows: extracted.rows.length, steps }
  };
}
