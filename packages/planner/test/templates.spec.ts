/* packages/planner/test/templates.spec.ts */
import { describe, it, expect } from 'vitest';
import { findMentions, goalTokens, matchTemplate, synthesize } from '../src/index.js';

const sale = { category: 'A', price: 10, product: 'p1' };

describe('goalTokens', () => {
  it('folds case and accents and splits on punctuation', () => {
    expect(goalTokens('Preço, por Categoria!')).toEqual(['preco', 'por', 'categoria']);
  });
});

describe('findMentions', () => {
  it('matches plurals', () => {
    expect(findMentions(['list', 'prices'], ['price'])).toEqual([{ field: 'price', pos: 1 }]);
  });

  it('matches the spoken form of a camelCase field', () => {
    expect(findMentions(['the', 'unit', 'price'], ['unitPrice'])).toEqual([{ field: 'unitPrice', pos: 1 }]);
  });

  it('orders mentions by position in the goal', () => {
    expect(findMentions(['city', 'and', 'name'], ['name', 'city']).map(m => m.field)).toEqual(['city', 'name']);
  });
});

describe('matchTemplate', () => {
  it('T5: total of a measure grouped by a dimension', () => {
    const m = matchTemplate('total price by category', '/data/sales', sale);
    expect(m.templateId).toBe('T5');
    expect(m.reason).toBe('Group by category with 1 metric(s)');
    expect(m.plan).toEqual({
      planVersion: '1.0',
      source: { recordPath: '/data/sales' },
      steps: [
        { op: 'groupBy', keys: ['/category'] },
        { op: 'aggregate', metrics: [{ as: 'sum_price', fn: 'sum', field: '/price' }] }
      ]
    });
  });

  it('T5 wins over T2 when the goal mentions fields and a count', () => {
    const m = matchTemplate('count users per city', '/', { name: 'a', city: 'x', age: 3 });
    expect(m.templateId).toBe('T5');
    expect(m.plan.steps).toEqual([
      { op: 'groupBy', keys: ['/city'] },
      { op: 'aggregate', metrics: [{ as: 'count', fn: 'count' }] }
    ]);
  });

  it('T5: several metrics get distinct names', () => {
    const m = matchTemplate('average and max price per category', '/', sale);
    expect(m.plan.steps[1]).toEqual({
      op: 'aggregate',
      metrics: [
        { as: 'avg_price', fn: 'avg', field: '/price' },
        { as: 'max_price', fn: 'max', field: '/price' }
      ]
    });
  });

  it('T2: selects mentioned fields in goal order', () => {
    const m = matchTemplate('show city and name', '/people', { name: 'Ana', city: 'Porto', age: 30 });
    expect(m.templateId).toBe('T2');
    expect(m.reason).toBe('Select 2 mentioned field(s)');
    expect(m.plan.steps).toEqual([
      { op: 'select', fields: [{ from: '/city', as: 'city' }, { from: '/name', as: 'name' }] }
    ]);
  });

  it('T2: mentions through aliases in another language', () => {
    const m = matchTemplate('Preço por categoria', '/', sale);
    expect(m.templateId).toBe('T2');
    expect(m.plan.steps).toEqual([
      { op: 'select', fields: [{ from: '/price', as: 'price' }, { from: '/category', as: 'category' }] }
    ]);
  });

  it('T1: selects everything with type hints', () => {
    const m = matchTemplate('', '/', { id: 1, tags: ['a'], ok: true, note: null });
    expect(m.templateId).toBe('T1');
    expect(m.reason).toBe('Select all 4 field(s)');
    expect(m.plan.steps).toEqual([{
      op: 'select',
      fields: [
        { from: '/id', as: 'id', typeHint: 'number' },
        { from: '/tags', as: 'tags', typeHint: 'array' },
        { from: '/ok', as: 'ok', typeHint: 'boolean' },
        { from: '/note', as: 'note', typeHint: 'null' }
      ]
    }]);
  });

  it('T1: an empty sample passes rows through', () => {
    const m = matchTemplate('anything', '/', {});
    expect(m.reason).toBe('Sample row is empty; rows pass through');
    expect(m.plan.steps).toEqual([]);
  });

  it('T5 aggregates all rows when there is no dimension to group on', () => {
    const m = matchTemplate('sum price and qty', '/', { price: 10, qty: 2, active: true });
    expect(m.templateId).toBe('T5');
    expect(m.reason).toBe('Aggregate all rows with 1 metric(s)');
    expect(m.plan.steps).toEqual([
      { op: 'aggregate', metrics: [{ as: 'sum_price', fn: 'sum', field: '/price' }] }
    ]);
  });

  it('T5 groups by a mentioned numeric field when asked to group', () => {
    const m = matchTemplate('group the prices', '/', { price: 10, qty: 2 });
    expect(m.templateId).toBe('T5');
    expect(m.plan.steps).toEqual([
      { op: 'groupBy', keys: ['/price'] },
      { op: 'aggregate', metrics: [{ as: 'count', fn: 'count' }] }
    ]);
  });

  it('synthesize returns the plan only', () => {
    expect(synthesize('show name', '/', { name: 'a' }).steps).toEqual([
      { op: 'select', fields: [{ from: '/name', as: 'name' }] }
    ]);
  });
});
