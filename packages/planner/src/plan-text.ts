// packages/planner/src/plan-text.ts
// Tolerant reading of plan text produced by a model or a person.
import type { TransformFailure, TransformPlan } from '@rowsmith/core';
import { Errors, TransformPlanSchema } from '@rowsmith/core';
import type { PlanLimits } from '@rowsmith/engine';
import { validatePlan } from '@rowsmith/engine';

export type PlanFailureCategory =
  | 'LLM_RESPONSE_EMPTY'
  | 'LLM_RESPONSE_NOT_JSON'
  | 'LLM_CONTRACT_INVALID'
  | 'PLAN_INVALID'
  | 'SOURCE_ERROR';

export type ParseStrategy = 'direct' | 'fenced' | 'braces' | 'object';

export type PlanTextResult =
  | { success: true; plan: TransformPlan; strategy: ParseStrategy }
  | { success: false; category: PlanFailureCategory; error: TransformFailure; errors: string[] };

// well-formed plans that break a structural rule are not retried
const RETRYABLE: Record<PlanFailureCategory, boolean> = {
  LLM_RESPONSE_EMPTY: true,
  LLM_RESPONSE_NOT_JSON: true,
  LLM_CONTRACT_INVALID: true,
  PLAN_INVALID: false,
  SOURCE_ERROR: true
};

export function isRetryable(category: PlanFailureCategory): boolean {
  return RETRYABLE[category];
}

export function planFailure(category: PlanFailureCategory, message: string, errors: string[] = [message]): PlanTextResult {
  return { success: false, category, error: Errors.PLAN_PARSE(category, message), errors };
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

const FENCE = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/;

function extractJson(text: string): { value: unknown; strategy: ParseStrategy } | null {
  const direct = tryJson(text);
  if (direct.ok) return { value: direct.value, strategy: 'direct' };

  const fenced = FENCE.exec(text);
  if (fenced) {
    const inner = tryJson(fenced[1].trim());
    if (inner.ok) return { value: inner.value, strategy: 'fenced' };
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first >= 0 && last > first) {
    const braces = tryJson(text.slice(first, last + 1));
    if (braces.ok) return { value: braces.value, strategy: 'braces' };
  }
  return null;
}

// contract check (is it a plan at all?) then structural rules
export function parsePlanValue(
  value: unknown,
  limits: Partial<PlanLimits> = {},
  strategy: ParseStrategy = 'object'
): PlanTextResult {
  const contract = TransformPlanSchema.safeParse(value);
  if (!contract.success) {
    const errors = contract.error.issues.map(i => `${i.path.join('.') || 'plan'}: ${i.message}`);
    return planFailure('LLM_CONTRACT_INVALID', `Response is not a valid plan: ${errors.join('; ')}`, errors);
  }
  const valid = validatePlan(value, limits);
  if (!valid.success) return planFailure('PLAN_INVALID', valid.error.message, valid.errors);
  return { success: true, plan: valid.plan, strategy };
}

export function parsePlanText(text: string, limits: Partial<PlanLimits> = {}): PlanTextResult {
  const trimmed = text.trim();
  if (!trimmed) return planFailure('LLM_RESPONSE_EMPTY', 'Response is empty');

  const found = extractJson(trimmed);
  if (!found) return planFailure('LLM_RESPONSE_NOT_JSON', 'Response does not contain a JSON object');
  return parsePlanValue(found.value, limits, found.strategy);
}
