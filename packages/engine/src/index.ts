export * from './executor.js';
export * from './validate.js';
export * from './csv.js';
export * from './conditions.js';
export { readField, fieldReader } from './fields.js';
export type { FieldReader } from './fields.js';
export { MISSING, compareValues, isMissing, truth } from './values.js';
export type { Missing, Tri, Value } from './values.js';

export type { Expr, ArithOp, CmpOp } from './expr/ast.js';
export { ExpressionSyntaxError } from './expr/ast.js';
export { tokenize } from './expr/lexer.js';
export type { Token } from './expr/lexer.js';
export { parseExpression, tryParseExpression } from './expr/parser.js';
export type { ParseOutcome } from './expr/parser.js';
export { evaluate } from './expr/interp.js';
export type { FieldLookup } from './expr/interp.js';
