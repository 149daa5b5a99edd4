/* packages/engine/test/validate.spec.ts */
import { describe, it, expect } from 'vitest';
import { validatePlan } from '../src/index.js';

const plan = (steps: unknown[]) => ({ source: { recordPath: '/' }, steps });

describe('validatePlan', () => {
  it('fills defaults on a minimal plan', () => {
    const r = validatePlan(plan([]));
    expect(r.success).toBe(true);
    if (!r.success) return;
    expect(r.plan).toEqual({ planVersion: '1.0', source: { recordPath: '/' }, steps: [] });
  });

  it('lower-cases sort directions', () => {
    const r = validatePlan(plan([{ op: 'sort', by: 'price', dir: 'DESC' }]));
    expect(r.success && r.plan.steps).toEqual([{ op: 'sort', by: 'price', dir: 'desc' }]);
  });

  it('names unknown operations', () => {
    const r = validatePlan(plan([{ op: 'select', fields: [{ from: 'a', as: 'a' }] }, { op: 'pivot' }]));
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error).toEqual({
      code: 'UnknownOp',
      message: "steps[1].op 'pivot' is not a known operation",
      details: { op: 'pivot', index: 1 }
    });
  });

  it('reports schema problems with their paths', () => {
    const r = validatePlan({ steps: [] });
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('PlanInvalid');
    expect(r.errors).toEqual(['source: Required']);
  });

  it('requires a positive limit', () => {
    const r = validatePlan(plan([{ op: 'limit', n: 0 }]));
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('PlanInvalid');
    expect(r.errors[0].startsWith('steps[0].n: ')).toBe(true);
  });

  it('requires groupBy to be followed by aggregate', () => {
    const r = validatePlan(plan([{ op: 'groupBy', keys: ['c'] }, { op: 'limit', n: 1 }]));
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.errors).toEqual(['steps[0] groupBy: must be immediately followed by aggregate']);
  });

  it('rejects duplicate output names and metrics without input', () => {
    const r = validatePlan(plan([
      { op: 'select', fields: [{ from: 'a', as: 'x' }, { from: 'b', as: 'x' }] },
      { op: 'aggregate', metrics: [{ as: 't', fn: 'sum' }] }
    ]));
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.errors).toEqual([
      "steps[0] select: duplicate output name 'x'",
      'steps[1] aggregate.metrics[0]: sum needs a field or expr'
    ]);
  });

  it('parses expressions up front', () => {
    const r = validatePlan(plan([{ op: 'compute', compute: [{ as: 't', expr: 'price *' }] }]));
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('ExpressionSyntax');
    expect(r.error.details).toEqual({ expr: 'price *', where: 'steps[0].compute[0]' });
  });

  it('accepts filter expressions and condition trees', () => {
    const r = validatePlan(plan([
      { op: 'filter', where: 'price >= 20 and stock > 0' },
      { op: 'filter', where: { op: 'and', items: [{ op: 'eq', left: { field: '/status' }, right: 'ok' }] } }
    ]));
    expect(r.success).toBe(true);
  });

  it('bounds the number of steps', () => {
    const r = validatePlan(plan([{ op: 'limit', n: 1 }, { op: 'limit', n: 1 }, { op: 'limit', n: 1 }]), { maxSteps: 2 });
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('LimitExceeded');
    expect(r.error.message).toBe('Plan has 3 steps, limit is 2');
  });
});
