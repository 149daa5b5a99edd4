/* packages/engine/test/expr.spec.ts */
import { describe, it, expect } from 'vitest';
import type { Row } from '@rowsmith/core';
import {
  ExpressionSyntaxError, MISSING, compareValues, evaluate, parseExpression, tokenize, tryParseExpression
} from '../src/index.js';

const run = (src: string, row: Row) => evaluate(parseExpression(src), row);

describe('tokenize', () => {
  it('splits operators, keywords, quoted names and strings', () => {
    const tokens = tokenize('a >= 10 and `unit price` != "x\\"y"');
    expect(tokens.map(t => t.kind)).toEqual(['ident', 'op', 'num', 'kw', 'ident', 'op', 'str', 'eof']);
    expect(tokens[4]).toEqual({ kind: 'ident', name: 'unit price', pos: 12 });
    expect(tokens[6]).toEqual({ kind: 'str', value: 'x"y', pos: 28 });
  });

  it('reads keywords case-insensitively and Unicode identifiers', () => {
    expect(tokenize('NOT preço')).toEqual([
      { kind: 'kw', kw: 'not', pos: 0 },
      { kind: 'ident', name: 'preço', pos: 4 },
      { kind: 'eof', pos: 9 }
    ]);
  });

  it('rejects stray characters and open strings', () => {
    expect(() => tokenize('#')).toThrow("unexpected character '#' at 0");
    expect(() => tokenize('"abc')).toThrow('unterminated string at 0');
  });
});

describe('parseExpression', () => {
  it('gives * precedence over +', () => {
    expect(parseExpression('1 + 2 * 3')).toEqual({
      kind: 'binary', op: '+',
      left: { kind: 'literal', value: 1 },
      right: {
        kind: 'binary', op: '*',
        left: { kind: 'literal', value: 2 },
        right: { kind: 'literal', value: 3 }
      }
    });
  });

  it('binds not tighter than or and looser than comparison', () => {
    expect(parseExpression('not a = 1 or b')).toEqual({
      kind: 'logical', op: 'or',
      left: {
        kind: 'unary', op: 'not',
        operand: { kind: 'compare', op: 'eq', left: { kind: 'field', ref: 'a' }, right: { kind: 'literal', value: 1 } }
      },
      right: { kind: 'field', ref: 'b' }
    });
  });

  it('nests ternaries to the right', () => {
    expect(parseExpression('a ? 1 : b ? 2 : 3')).toEqual({
      kind: 'ternary',
      test: { kind: 'field', ref: 'a' },
      then: { kind: 'literal', value: 1 },
      else: {
        kind: 'ternary',
        test: { kind: 'field', ref: 'b' },
        then: { kind: 'literal', value: 2 },
        else: { kind: 'literal', value: 3 }
      }
    });
  });

  it('reports where parsing stopped', () => {
    expect(() => parseExpression('1 +')).toThrow(ExpressionSyntaxError);
    expect(() => parseExpression('1 +')).toThrow('unexpected end of input at 3, expected a value');
    expect(() => parseExpression('a < b < c')).toThrow('unexpected < at 6');
    expect(tryParseExpression('(1')).toEqual({
      ok: false,
      message: "unexpected end of input at 2, expected ')'",
      pos: 2
    });
  });
});

describe('evaluate', () => {
  const row: Row = { price: 10, qty: '3', 'unit price': 4, address: { city: 'Porto' }, note: null };

  it('does arithmetic on numbers and numeric strings', () => {
    expect(run('price * qty', row)).toBe(30);
    expect(run('-price + 1', row)).toBe(-9);
    expect(run('(price - 4) / 4', row)).toBe(1.5);
  });

  it('yields null for bad operands and division by zero', () => {
    expect(run('price / 0', row)).toBeNull();
    expect(run('price + "abc"', row)).toBeNull();
    expect(run('note * 2', row)).toBeNull();
  });

  it('keeps unresolved fields unknown', () => {
    expect(run('missing + 1', row)).toBe(MISSING);
    expect(run('missing > 1 and price > 5', row)).toBe(MISSING);
    expect(run('missing > 1 or price > 5', row)).toBe(true);
    expect(run('missing > 1 and price > 50', row)).toBe(false);
    expect(run('not missing', row)).toBe(MISSING);
    expect(run('missing ? 1 : 2', row)).toBe(MISSING);
  });

  it('compares numerically when one side is a number', () => {
    expect(run('qty = 3', row)).toBe(true);
    expect(run('price > 5 && qty >= 3', row)).toBe(true);
    expect(run('"10" < "9"', row)).toBe(true);
    expect(run('note == null', row)).toBe(true);
  });

  it('evaluates ternaries', () => {
    expect(run('price > 5 ? "high" : "low"', row)).toBe('high');
  });

  it('resolves quoted, nested, aliased and differently cased names', () => {
    expect(run('`unit price` * 2', row)).toBe(8);
    expect(run('`/address/city`', row)).toBe('Porto');
    expect(run('preco * 2', row)).toBe(20);
    expect(run('PRICE', row)).toBe(10);
  });

  it('reads keywords in any case', () => {
    expect(run('TRUE AND FALSE', row)).toBe(false);
  });
});

describe('compareValues', () => {
  it('handles membership and containment', () => {
    expect(compareValues('in', 2, [1, 2])).toBe(true);
    expect(compareValues('in', 2, 2)).toBe(false);
    expect(compareValues('contains', 'Hello World', 'world')).toBe(true);
    expect(compareValues('contains', ['a', 'b'], 'b')).toBe(true);
  });

  it('treats non-comparable ordering as false and null as equal only to null', () => {
    expect(compareValues('gt', { a: 1 }, 0)).toBe(false);
    expect(compareValues('gt', true, false)).toBe(true);
    expect(compareValues('eq', null, null)).toBe(true);
    expect(compareValues('neq', null, 1)).toBe(true);
    expect(compareValues('eq', MISSING, 1)).toBe('unknown');
  });
});
