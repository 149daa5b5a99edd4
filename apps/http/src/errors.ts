// apps/http/src/errors.ts
import { ZodError } from 'zod';
import type { ErrorCode } from '@rowsmith/core';
import { isTransformError } from '@rowsmith/core';

export type HttpErrorCode = 'VALIDATION' | 'RATE_LIMITED' | 'INTERNAL';

export interface ClassifiedError {
  code: HttpErrorCode | ErrorCode;
  status: number;
  message: string;
}

export interface ValidationIssue {
  path: string;
  msg: string;
}

export function zodDetails(e: ZodError): ValidationIssue[] {
  return e.issues.map(i => ({ path: i.path.join('.'), msg: i.message }));
}

// fastify's own body/schema failures and rate-limit replies carry a 4xx statusCode
function clientStatus(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null || !('statusCode' in e)) return undefined;
  const s = e.statusCode;
  return typeof s === 'number' && s >= 400 && s < 500 ? s : undefined;
}

function messageOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') return e.message;
  return String(e);
}

export function classifyError(e: unknown): ClassifiedError {
  const message = messageOf(e);
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message };
  if (isTransformError(e)) return { code: e.code, status: 422, message };
  const status = clientStatus(e);
  if (status !== undefined) return { code: status === 429 ? 'RATE_LIMITED' : 'VALIDATION', status, message };
  return { code: 'INTERNAL', status: 500, message };
}
