// packages/engine/src/expr/parser.ts
// Recursive descent, lowest precedence first:
//   ternary > or > and > not > comparison > additive > multiplicative > unary minus > primary
import type { ArithOp, CmpOp, Expr } from './ast.js';
import { ExpressionSyntaxError } from './ast.js';
import type { Token } from './lexer.js';
import { tokenize } from './lexer.js';

const COMPARE: Record<string, CmpOp> = {
  '==': 'eq', '=': 'eq', '!=': 'neq',
  '>': 'gt', '>=': 'gte', '<': 'lt', '<=': 'lte'
};

function describe(t: Token): string {
  switch (t.kind) {
    case 'num': return String(t.value);
    case 'str': return JSON.stringify(t.value);
    case 'ident': return t.name;
    case 'kw': return t.kw;
    case 'op': return t.op;
    case 'eof': return 'end of input';
  }
}

class Parser {
  private i = 0;
  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[Math.min(this.i, this.tokens.length - 1)];
  }

  private next(): Token {
    const t = this.peek();
    if (this.i < this.tokens.length - 1) this.i++;
    return t;
  }

  private isOp(...ops: string[]): boolean {
    const t = this.peek();
    return t.kind === 'op' && ops.includes(t.op);
  }

  private isKw(kw: string): boolean {
    const t = this.peek();
    return t.kind === 'kw' && t.kw === kw;
  }

  private fail(t: Token, expected?: string): never {
    const tail = expected ? `, expected ${expected}` : '';
    throw new ExpressionSyntaxError(`unexpected ${describe(t)} at ${t.pos}${tail}`, t.pos);
  }

  private expectOp(op: string) {
    if (!this.isOp(op)) this.fail(this.peek(), `'${op}'`);
    this.next();
  }

  parse(): Expr {
    const e = this.ternary();
    const t = this.peek();
    if (t.kind !== 'eof') this.fail(t);
    return e;
  }

  private ternary(): Expr {
    const test = this.or();
    if (!this.isOp('?')) return test;
    this.next();
    const then = this.ternary();
    this.expectOp(':');
    return { kind: 'ternary', test, then, else: this.ternary() };
  }

  private or(): Expr {
    let left = this.and();
    while (this.isKw('or') || this.isOp('||')) {
      this.next();
      left = { kind: 'logical', op: 'or', left, right: this.and() };
    }
    return left;
  }

  private and(): Expr {
    let left = this.not();
    while (this.isKw('and') || this.isOp('&&')) {
      this.next();
      left = { kind: 'logical', op: 'and', left, right: this.not() };
    }
    return left;
  }

  private not(): Expr {
    if (this.isKw('not') || this.isOp('!')) {
      this.next();
      return { kind: 'unary', op: 'not', operand: this.not() };
    }
    return this.comparison();
  }

  // non-associative: "a < b < c" is rejected
  private comparison(): Expr {
    const left = this.additive();
    const t = this.peek();
    if (t.kind === 'op' && Object.hasOwn(COMPARE, t.op)) {
      this.next();
      return { kind: 'compare', op: COMPARE[t.op], left, right: this.additive() };
    }
    return left;
  }

  private arith(ops: readonly ArithOp[]): ArithOp | null {
    const t = this.peek();
    if (t.kind !== 'op') return null;
    return ops.find(o => o === t.op) ?? null;
  }

  private additive(): Expr {
    let left = this.multiplicative();
    for (let op = this.arith(['+', '-']); op; op = this.arith(['+', '-'])) {
      this.next();
      left = { kind: 'binary', op, left, right: this.multiplicative() };
    }
    return left;
  }

  private multiplicative(): Expr {
    let left = this.unary();
    for (let op = this.arith(['*', '/']); op; op = this.arith(['*', '/'])) {
      this.next();
      left = { kind: 'binary', op, left, right: this.unary() };
    }
    return left;
  }

  private unary(): Expr {
    if (this.isOp('-')) {
      this.next();
      return { kind: 'unary', op: '-', operand: this.unary() };
    }
    return this.primary();
  }

  private primary(): Expr {
    const t = this.next();
    switch (t.kind) {
      case 'num': return { kind: 'literal', value: t.value };
      case 'str': return { kind: 'literal', value: t.value };
      case 'ident': return { kind: 'field', ref: t.name };
      case 'kw':
        if (t.kw === 'true') return { kind: 'literal', value: true };
        if (t.kw === 'false') return { kind: 'literal', value: false };
        if (t.kw === 'null') return { kind: 'literal', value: null };
        return this.fail(t, 'a value');
      case 'op':
        if (t.op === '(') {
          const inner = this.ternary();
          this.expectOp(')');
          return inner;
        }
        return this.fail(t, 'a value');
      case 'eof':
        return this.fail(t, 'a value');
    }
  }
}

export function parseExpression(src: string): Expr {
  return new Parser(tokenize(src)).parse();
}

export type ParseOutcome =
  | { ok: true; expr: Expr }
  | { ok: false; message: string; pos: number };

export function tryParseExpression(src: string): ParseOutcome {
  try {
    return { ok: true, expr: parseExpression(src) };
  } catch (e) {
    if (e instanceof ExpressionSyntaxError) return { ok: false, message: e.message, pos: e.pos };
    throw e;
  }
}
