/* packages/shape/test/discovery.spec.ts */
import { describe, it, expect } from 'vitest';
import type { JsonValue, RecordPathCandidate } from '@rowsmith/core';
import { discover, goalWords, scoreCandidate } from '../src/index.js';

const weather: JsonValue = {
  results: {
    users: [{ name: 'Ana', age: 31 }, { name: 'Bo', age: 40 }],
    forecast: [{ day: 'mon', temp: 21 }, { day: 'tue', temp: 19 }]
  }
};

function cand(over: Partial<RecordPathCandidate>): RecordPathCandidate {
  return { path: '/', arrayLength: 0, objectFieldCount: 0, hasObjectItems: false, depth: 0, score: 0, ...over };
}

describe('discover', () => {
  it('accepts a root array as "/"', () => {
    const r = discover([{ a: 1 }, { a: 2 }]);
    expect(r.success).toBe(true);
    if (!r.success) return;
    expect(r.recordPath).toBe('/');
    expect(r.score).toBe(62.5);
    expect(r.candidates).toHaveLength(1);
  });

  it('breaks ties by first-seen order without a goal', () => {
    const r = discover(weather);
    expect(r.success && r.recordPath).toBe('/results/users');
    expect(r.success && r.score).toBe(88);
  });

  it('lets the goal text pick between equally plausible arrays', () => {
    const r = discover(weather, 'extract forecast temperatures');
    expect(r.success && r.recordPath).toBe('/results/forecast');
    expect(r.success && r.score).toBe(128);
  });

  it('is deterministic', () => {
    expect(discover(weather, 'users')).toEqual(discover(weather, 'users'));
  });

  it('prefers arrays of objects over arrays of primitives', () => {
    const r = discover({ tags: ['a', 'b', 'c'], items: [{ id: 1 }] });
    expect(r.success && r.recordPath).toBe('/items');
    expect(r.candidates.map(c => [c.path, c.score])).toEqual([['/items', 91.5], ['/tags', -17]]);
  });

  it('accepts an empty nested array', () => {
    const r = discover({ meta: { page: 1 }, data: [] });
    expect(r.success && r.recordPath).toBe('/data');
    expect(r.success && r.score).toBe(40);
  });

  it('fails when only primitive arrays exist', () => {
    const r = discover({ ids: [1, 2, 3] });
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('NoRecordsetFound');
    expect(r.candidates).toHaveLength(1);
  });

  it('fails on a primitive document', () => {
    const r = discover(42);
    expect(r.success).toBe(false);
    if (r.success) return;
    expect(r.error.code).toBe('NoRecordsetFound');
    expect(r.candidates).toEqual([]);
  });

  it('stops walking at maxDepth', () => {
    const deep: JsonValue = { a: { b: { c: { d: { e: { f: [{ x: 1 }] } } } } } };
    expect(discover(deep).success).toBe(false);
    const r = discover(deep, undefined, { maxDepth: 6 });
    expect(r.success && r.recordPath).toBe('/a/b/c/d/e/f');
  });

  it('escapes "/" in property names', () => {
    const r = discover({ 'a/b': [{ x: 1 }] });
    expect(r.success && r.recordPath).toBe('/a~1b');
  });
});

describe('scoreCandidate', () => {
  it('adds length, object, collection-name and exact goal bonuses', () => {
    const c = cand({ path: '/orders', arrayLength: 5, objectFieldCount: 12, hasObjectItems: true, depth: 1 });
    expect(scoreCandidate(c, ['orders'])).toBe(150);
  });

  it('rewards a goal word on an ancestor and penalizes depth', () => {
    const c = cand({ path: '/sales/rows', arrayLength: 1, objectFieldCount: 2, hasObjectItems: true, depth: 2 });
    expect(scoreCandidate(c, ['sales'])).toBe(97);
  });

  it('gives partial credit for a contained goal word', () => {
    const c = cand({ path: '/orderLines', arrayLength: 1, objectFieldCount: 0, hasObjectItems: true, depth: 1 });
    expect(scoreCandidate(c, ['order'])).toBe(76);
  });
});

describe('goalWords', () => {
  it('folds case and accents and drops short and stop words', () => {
    expect(goalWords('Get the Preço per Category!')).toEqual(['preco', 'per', 'category']);
  });

  it('returns nothing for a missing goal', () => {
    expect(goalWords(undefined)).toEqual([]);
  });
});
