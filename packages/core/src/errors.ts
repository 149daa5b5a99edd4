import type { JsonObject } from './types.js';

// Structural failures only. Data problems (missing fields, bad operands)
// never reach this taxonomy; they degrade to null / dropped rows + warnings.
export type ErrorCode =
  | 'NoRecordsetFound'
  | 'WrongShape'
  | 'RecordPathNotFound'
  | 'PlanInvalid'
  | 'UnknownOp'
  | 'ExpressionSyntax'
  | 'LimitExceeded'
  | 'PlanParseError';

export interface TransformFailure {
  code: ErrorCode;
  message: string;
  details?: JsonObject;
}

export type Result<T extends object> =
  | ({ success: true } & T)
  | { success: false; error: TransformFailure };

function failure(code: ErrorCode, message: string, details?: JsonObject): TransformFailure {
  return details ? { code, message, details } : { code, message };
}

export const Errors = {
  NO_RECORDSET: (reason: string) => failure('NoRecordsetFound', `NoRecordsetFound: ${reason}`),
  WRONG_SHAPE: (kind: string) =>
    failure('WrongShape', `WrongShape: cannot interpret ${kind} as a record set (expected array, object or null)`, { kind }),
  RECORD_PATH_NOT_FOUND: (path: string) =>
    failure('RecordPathNotFound', `Record path '${path}' not found in input`, { recordPath: path }),
  PLAN_INVALID: (errors: string[]) =>
    failure('PlanInvalid', `Plan validation failed: ${errors.join('; ')}`, { errors }),
  UNKNOWN_OP: (op: string, index: number) =>
    failure('UnknownOp', `steps[${index}].op '${op}' is not a known operation`, { op, index }),
  EXPRESSION_SYNTAX: (expr: string, msg: string, where: string) =>
    failure('ExpressionSyntax', `${where}: cannot parse expression '${expr}': ${msg}`, { expr, where }),
  LIMIT_EXCEEDED: (what: 'rows' | 'steps', actual: number, max: number) =>
    failure('LimitExceeded', `${what === 'steps' ? 'Plan' : 'Input'} has ${actual} ${what}, limit is ${max}`, { what, actual, max }),
  PLAN_PARSE: (category: string, msg: string) =>
    failure('PlanParseError', msg, { category })
} as const;

export class TransformError extends Error {
  readonly code: ErrorCode;
  readonly details?: JsonObject;

  constructor(f: TransformFailure) {
    super(f.message);
    this.name = 'TransformError';
    this.code = f.code;
    this.details = f.details;
  }

  toFailure(): TransformFailure {
    return failure(this.code, this.message, this.details);
  }
}

export function isTransformError(e: unknown): e is TransformError {
  return e instanceof TransformError;
}
