import type { JsonPrimitive } from '@rowsmith/core';

export type ArithOp = '+' | '-' | '*' | '/';
export type CmpOp = 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte';

export type Expr =
  | { kind: 'literal'; value: JsonPrimitive }
  | { kind: 'field'; ref: string }
  | { kind: 'unary'; op: '-' | 'not'; operand: Expr }
  | { kind: 'binary'; op: ArithOp; left: Expr; right: Expr }
  | { kind: 'compare'; op: CmpOp; left: Expr; right: Expr }
  | { kind: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { kind: 'ternary'; test: Expr; then: Expr; else: Expr };

export class ExpressionSyntaxError extends Error {
  constructor(message: string, readonly pos: number) {
    super(message);
    this.name = 'ExpressionSyntaxError';
  }
}
