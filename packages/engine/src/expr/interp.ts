// packages/engine/src/expr/interp.ts
import type { Row } from '@rowsmith/core';
import { toNumber } from '@rowsmith/core';
import type { ArithOp, Expr } from './ast.js';
import type { Value } from '../values.js';
import { MISSING, compareValues, isMissing, triAnd, triNot, triOr, triToValue, truth } from '../values.js';
import { readField } from '../fields.js';

export type FieldLookup = (ref: string, row: Row) => Value;

function arith(op: ArithOp, a: Value, b: Value): Value {
  if (isMissing(a) || isMissing(b)) return MISSING;
  const x = toNumber(a);
  const y = toNumber(b);
  if (x === null || y === null) return null;
  if (op === '/' && y === 0) return null;
  const r = op === '+' ? x + y : op === '-' ? x - y : op === '*' ? x * y : x / y;
  return Number.isFinite(r) ? r : null;
}

export function evaluate(expr: Expr, row: Row, lookup: FieldLookup = readField): Value {
  const ev = (e: Expr) => evaluate(e, row, lookup);
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'field':
      return lookup(expr.ref, row);
    case 'unary': {
      const v = ev(expr.operand);
      if (expr.op === 'not') return triToValue(triNot(truth(v)));
      if (isMissing(v)) return MISSING;
      const n = toNumber(v);
      return n === null ? null : -n;
    }
    case 'binary':
      return arith(expr.op, ev(expr.left), ev(expr.right));
    case 'compare':
      return triToValue(compareValues(expr.op, ev(expr.left), ev(expr.right)));
    case 'logical': {
      const left = truth(ev(expr.left));
      // short-circuit only when the answer is already decided
      if (expr.op === 'and' && left === false) return false;
      if (expr.op === 'or' && left === true) return true;
      const right = truth(ev(expr.right));
      return triToValue(expr.op === 'and' ? triAnd(left, right) : triOr(left, right));
    }
    case 'ternary': {
      const t = truth(ev(expr.test));
      if (t === 'unknown') return MISSING;
      return t ? ev(expr.then) : ev(expr.else);
    }
  }
}

