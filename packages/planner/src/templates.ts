// packages/planner/src/templates.ts
// Deterministic plan synthesis from a goal sentence and a sample row.
// Fixed precedence: T5 (group + aggregate) > T2 (mentioned fields) > T1 (everything).
import fs from 'node:fs';
import { z } from 'zod';
import type { FieldSpec, MetricFn, MetricSpec, Row, TransformPlan, TypeHint } from '@rowsmith/core';
import { PLAN_VERSION, fieldOf, foldText, formatPointer, jsonKind } from '@rowsmith/core';
import { aliasIndex, conventionKey, spokenForm } from '@rowsmith/shape';

export type TemplateId = 'T1' | 'T2' | 'T5';

export interface TemplateMatch {
  templateId: TemplateId;
  plan: TransformPlan;
  reason: string;
}

// ---------- keyword data ----------
const Words = z.array(z.string().min(1)).transform(ws => ws.map(foldText));

const KeywordFileSchema = z.object({
  version: z.literal(1),
  aggregate: z.object({ group: Words, sum: Words, count: Words, avg: Words, min: Words, max: Words }),
  by: Words,
  categorical: Words,
  measure: Words
});
type Keywords = z.infer<typeof KeywordFileSchema>;

let cached: Keywords | undefined;

function keywords(): Keywords {
  if (cached) return cached;
  const url = new URL('../data/template-keywords.json', import.meta.url);
  cached = KeywordFileSchema.parse(JSON.parse(fs.readFileSync(url, 'utf-8')));
  return cached;
}

type AggKind = keyof Keywords['aggregate'];
const AGG_KINDS: readonly AggKind[] = ['group', 'sum', 'count', 'avg', 'min', 'max'];

// ---------- tiny helpers ----------
export function goalTokens(goal: string): string[] {
  return foldText(goal).split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

const ptr = (field: string) => formatPointer([field]);

function plan(recordPath: string, steps: TransformPlan['steps']): TransformPlan {
  return { planVersion: PLAN_VERSION, source: { recordPath }, steps };
}

function typeHintOf(row: Row, field: string): TypeHint {
  const v = fieldOf(row, field);
  return v === undefined ? 'unknown' : jsonKind(v);
}

// ---------- field mentions ----------
export interface Mention {
  field: string;
  pos: number; // token index of the first mention
}

function singleForms(field: string): Set<string> {
  const folded = foldText(field);
  const forms = new Set([folded, conventionKey(field)]);
  aliasIndex().get(folded)?.forEach(a => forms.add(a));
  return forms;
}

// "prices" mentions "price"
function tokenMatches(tok: string, forms: Set<string>): boolean {
  return forms.has(tok) || (tok.length > 3 && tok.endsWith('s') && forms.has(tok.slice(0, -1)));
}

export function findMentions(tokens: readonly string[], fields: readonly string[]): Mention[] {
  const out: Mention[] = [];
  for (const field of fields) {
    const forms = singleForms(field);
    let pos = tokens.findIndex(t => tokenMatches(t, forms));

    // multi-word spelling: "unit price" for unitPrice
    const words = spokenForm(field).split(' ');
    if (words.length > 1) {
      const multi = tokens.findIndex((_, i) => words.every((w, j) => {
        const t = tokens[i + j];
        return t !== undefined && tokenMatches(t, new Set([w]));
      }));
      if (multi >= 0 && (pos < 0 || multi < pos)) pos = multi;
    }
    if (pos >= 0) out.push({ field, pos });
  }
  // stable: equal positions keep sample order
  return out.sort((a, b) => a.pos - b.pos);
}

// ---------- T5 ----------
function uniqueName(base: string, used: Set<string>): string {
  let name = base;
  for (let n = 2; used.has(name); n++) name = `${base}_${n}`;
  used.add(name);
  return name;
}

function matchT5(tokens: string[], recordPath: string, sample: Row, mentions: Mention[]): TemplateMatch | null {
  const kw = keywords();
  const hits: { kind: AggKind; pos: number }[] = [];
  tokens.forEach((t, pos) => {
    const kind = AGG_KINDS.find(k => kw.aggregate[k].includes(t));
    if (kind) hits.push({ kind, pos });
  });
  if (hits.length === 0) return null;

  const fields = Object.keys(sample);
  const isNum = (f: string) => typeof fieldOf(sample, f) === 'number';
  const isStr = (f: string) => typeof fieldOf(sample, f) === 'string';
  const nameHas = (f: string, words: string[]) => words.some(w => foldText(f).includes(w));

  // grouping dimension; none means one aggregate row over everything
  const byPos = tokens.findIndex(t => kw.by.includes(t));
  const grouping = hits.some(h => h.kind === 'group');
  const dim =
    (byPos >= 0 ? mentions.find(m => m.pos > byPos)?.field : undefined) ??
    mentions.find(m => !isNum(m.field))?.field ??
    fields.find(f => isStr(f) && nameHas(f, kw.categorical)) ??
    fields.find(isStr) ??
    (grouping ? mentions[0]?.field : undefined);

  const numericMentions = mentions.filter(m => isNum(m.field) && m.field !== dim);
  const measure = fields.find(f => f !== dim && isNum(f) && nameHas(f, kw.measure));
  const firstNumeric = fields.find(f => f !== dim && isNum(f));

  const picked: { fn: MetricFn; field?: string }[] = [];
  for (const hit of hits) {
    if (hit.kind === 'group') continue;
    if (hit.kind === 'count') {
      if (!picked.some(p => p.fn === 'count')) picked.push({ fn: 'count' });
      continue;
    }
    const field =
      numericMentions.find(m => m.pos > hit.pos)?.field ??
      numericMentions[0]?.field ??
      measure ??
      firstNumeric;
    if (field === undefined) continue;
    const fn = hit.kind;
    if (!picked.some(p => p.fn === fn && p.field === field)) picked.push({ fn, field });
  }
  // a bare group keyword still needs something to aggregate
  if (picked.length === 0) picked.push({ fn: 'count' });

  const used = new Set<string>(dim === undefined ? [] : [dim]);
  const metrics: MetricSpec[] = picked.map(p => p.field === undefined
    ? { as: uniqueName('count', used), fn: p.fn }
    : { as: uniqueName(`${p.fn}_${p.field}`, used), fn: p.fn, field: ptr(p.field) });

  if (dim === undefined) {
    return {
      templateId: 'T5',
      plan: plan(recordPath, [{ op: 'aggregate', metrics }]),
      reason: `Aggregate all rows with ${metrics.length} metric(s)`
    };
  }
  return {
    templateId: 'T5',
    plan: plan(recordPath, [
      { op: 'groupBy', keys: [ptr(dim)] },
      { op: 'aggregate', metrics }
    ]),
    reason: `Group by ${dim} with ${metrics.length} metric(s)`
  };
}

// ---------- T2 / T1 ----------
function matchT2(recordPath: string, mentions: Mention[]): TemplateMatch | null {
  if (mentions.length === 0) return null;
  const fields: FieldSpec[] = mentions.map(m => ({ from: ptr(m.field), as: m.field }));
  return {
    templateId: 'T2',
    plan: plan(recordPath, [{ op: 'select', fields }]),
    reason: `Select ${fields.length} mentioned field(s)`
  };
}

function matchT1(recordPath: string, sample: Row): TemplateMatch {
  const fields: FieldSpec[] = Object.keys(sample).map(f => ({ from: ptr(f), as: f, typeHint: typeHintOf(sample, f) }));
  if (fields.length === 0) {
    return { templateId: 'T1', plan: plan(recordPath, []), reason: 'Sample row is empty; rows pass through' };
  }
  return {
    templateId: 'T1',
    plan: plan(recordPath, [{ op: 'select', fields }]),
    reason: `Select all ${fields.length} field(s)`
  };
}

// ---------- public ----------
export function matchTemplate(goalText: string, recordPath: string, sampleRow: Row): TemplateMatch {
  const tokens = goalTokens(goalText);
  const mentions = findMentions(tokens, Object.keys(sampleRow));
  return (
    matchT5(tokens, recordPath, sampleRow, mentions) ??
    matchT2(recordPath, mentions) ??
    matchT1(recordPath, sampleRow)
  );
}

export function synthesize(goalText: string, recordPath: string, sampleRow: Row): TransformPlan {
  return matchTemplate(goalText, recordPath, sampleRow).plan;
}
