// packages/engine/src/conditions.ts
// Declarative condition trees (filter.where as an object).
import type { Condition, FieldOperand, Operand, Row } from '@rowsmith/core';
import type { Tri, Value } from './values.js';
import { compareValues, triAnd, triNot, triOr } from './values.js';
import { readField } from './fields.js';

export function isFieldOperand(o: Operand): o is FieldOperand {
  return typeof o === 'object' && o !== null && !Array.isArray(o) && typeof o.field === 'string';
}

function operandValue(o: Operand, row: Row): Value {
  return isFieldOperand(o) ? readField(o.field, row) : o;
}

export function evalCondition(c: Condition, row: Row): Tri {
  switch (c.op) {
    case 'and':
      return c.items.reduce<Tri>((acc, item) => triAnd(acc, evalCondition(item, row)), true);
    case 'or':
      return c.items.reduce<Tri>((acc, item) => triOr(acc, evalCondition(item, row)), false);
    case 'not':
      return c.items.length === 1 ? triNot(evalCondition(c.items[0], row)) : 'unknown';
    default:
      return compareValues(c.op, operandValue(c.left, row), operandValue(c.right, row));
  }
}
