// packages/engine/src/validate.ts
// Single structural gate for every plan, whatever produced it.
import { z } from 'zod';
import type { PlanStep, TransformFailure, TransformPlan } from '@rowsmith/core';
import { Errors, PLAN_OPS, TransformPlanSchema } from '@rowsmith/core';
import { tryParseExpression } from './expr/parser.js';

export interface PlanLimits {
  maxRows: number;
  maxSteps: number;
}

export const DEFAULT_LIMITS: PlanLimits = { maxRows: 50_000, maxSteps: 64 };

export type ValidationResult =
  | { success: true; plan: TransformPlan }
  | { success: false; error: TransformFailure; errors: string[] };

// just enough shape to spot an unknown op before the full schema runs
const OpProbeSchema = z.object({
  steps: z.array(z.object({ op: z.unknown() }).passthrough())
});

function isKnownOp(op: unknown): boolean {
  return PLAN_OPS.some(known => known === op);
}

function fail(error: TransformFailure, errors: string[] = [error.message]): ValidationResult {
  return { success: false, error, errors };
}

function issuePath(path: (string | number)[]): string {
  return path.reduce<string>((acc, seg) => (typeof seg === 'number' ? `${acc}[${seg}]` : acc ? `${acc}.${seg}` : seg), '');
}

function duplicates(names: string[]): string[] {
  return names.filter((n, i) => names.indexOf(n) !== i);
}

function structuralErrors(steps: PlanStep[]): string[] {
  const errors: string[] = [];
  steps.forEach((step, i) => {
    const at = `steps[${i}] ${step.op}`;
    switch (step.op) {
      case 'select':
        for (const d of duplicates(step.fields.map(f => f.as))) errors.push(`${at}: duplicate output name '${d}'`);
        break;
      case 'compute':
        for (const d of duplicates(step.compute.map(c => c.as))) errors.push(`${at}: duplicate output name '${d}'`);
        break;
      case 'mapValue':
        for (const d of duplicates(step.map.map(m => m.as))) errors.push(`${at}: duplicate output name '${d}'`);
        break;
      case 'groupBy':
        if (steps[i + 1]?.op !== 'aggregate') errors.push(`${at}: must be immediately followed by aggregate`);
        break;
      case 'aggregate':
        for (const d of duplicates(step.metrics.map(m => m.as))) errors.push(`${at}: duplicate metric name '${d}'`);
        step.metrics.forEach((m, j) => {
          if (m.field && m.expr) errors.push(`${at}.metrics[${j}]: use either field or expr, not both`);
          if (m.fn !== 'count' && !m.field && !m.expr) errors.push(`${at}.metrics[${j}]: ${m.fn} needs a field or expr`);
        });
        break;
      case 'filter':
      case 'sort':
      case 'limit':
        break;
    }
  });
  return errors;
}

function expressions(steps: PlanStep[]): { expr: string; where: string }[] {
  const out: { expr: string; where: string }[] = [];
  steps.forEach((step, i) => {
    if (step.op === 'compute') step.compute.forEach((c, j) => out.push({ expr: c.expr, where: `steps[${i}].compute[${j}]` }));
    if (step.op === 'filter' && typeof step.where === 'string') out.push({ expr: step.where, where: `steps[${i}].where` });
    if (step.op === 'aggregate') {
      step.metrics.forEach((m, j) => { if (m.expr) out.push({ expr: m.expr, where: `steps[${i}].metrics[${j}]` }); });
    }
  });
  return out;
}

export function validatePlan(input: unknown, limits: Partial<PlanLimits> = {}): ValidationResult {
  const maxSteps = limits.maxSteps ?? DEFAULT_LIMITS.maxSteps;

  const probe = OpProbeSchema.safeParse(input);
  if (probe.success) {
    const index = probe.data.steps.findIndex(s => s.op !== undefined && !isKnownOp(s.op));
    if (index >= 0) {
      const op = probe.data.steps[index].op;
      return fail(Errors.UNKNOWN_OP(typeof op === 'string' ? op : String(JSON.stringify(op)), index));
    }
  }

  const parsed = TransformPlanSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(i => `${issuePath(i.path) || 'plan'}: ${i.message}`);
    return fail(Errors.PLAN_INVALID(errors), errors);
  }
  const plan = parsed.data;

  if (plan.steps.length > maxSteps) return fail(Errors.LIMIT_EXCEEDED('steps', plan.steps.length, maxSteps));

  const errors = structuralErrors(plan.steps);
  if (errors.length) return fail(Errors.PLAN_INVALID(errors), errors);

  for (const { expr, where } of expressions(plan.steps)) {
    const r = tryParseExpression(expr);
    if (!r.ok) return fail(Errors.EXPRESSION_SYNTAX(expr, r.message, where));
  }

  return { success: true, plan };
}
