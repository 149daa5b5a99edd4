// packages/planner/src/plan-source.ts
// Plan resolution: supplied plan -> plan source (with retries) -> template.
import type {
  JsonValue, PlanOrigin, RecordPathCandidate, Row, TransformFailure, TransformPlan, TransformPlanInput
} from '@rowsmith/core';
import type { PlanLimits } from '@rowsmith/engine';
import { validatePlan } from '@rowsmith/engine';
import { discover, extractAndNormalize } from '@rowsmith/shape';
import type { PlanFailureCategory, PlanTextResult } from './plan-text.js';
import { isRetryable, parsePlanText, parsePlanValue, planFailure } from './plan-text.js';
import type { TemplateId } from './templates.js';
import { matchTemplate } from './templates.js';

export interface PlanRequest {
  goalText?: string;
  recordPath: string;
  sampleRow: Row;
  attempt: number;            // 1-based
  previousErrors: string[];   // from earlier attempts, for sources that can use feedback
}

/** Anything that can propose a plan: a model client, a stored plan, a person. null = declined. */
export interface PlanSource {
  tryGetPlan(request: PlanRequest): Promise<TransformPlanInput | string | null>;
}

export function textPlanSource(text: string): PlanSource {
  return { tryGetPlan: async () => text };
}

export interface ResolveRequest {
  document: JsonValue;
  goalText?: string;
  recordPath?: string;
  plan?: unknown;
}

export interface ResolveOptions {
  source?: PlanSource;
  maxAttempts?: number;
  limits?: Partial<PlanLimits>;
}

export type ResolveResult =
  | {
      success: true;
      plan: TransformPlan;
      origin: PlanOrigin;
      templateId?: TemplateId;
      reason: string;
      recordPath: string;
      candidates: RecordPathCandidate[];
      sampleRow: Row;
      attempts: number;
      warnings: string[];
    }
  | { success: false; error: TransformFailure; warnings: string[] };

export const DEFAULT_MAX_ATTEMPTS = 2;

async function ask(source: PlanSource, req: PlanRequest, limits: Partial<PlanLimits>): Promise<PlanTextResult | null> {
  let answer: TransformPlanInput | string | null;
  try {
    answer = await source.tryGetPlan(req);
  } catch (e) {
    return planFailure('SOURCE_ERROR', `Plan source failed: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (answer === null) return null;
  return typeof answer === 'string' ? parsePlanText(answer, limits) : parsePlanValue(answer, limits);
}

export async function resolvePlan(request: ResolveRequest, options: ResolveOptions = {}): Promise<ResolveResult> {
  const limits = options.limits ?? {};
  const warnings: string[] = [];

  // a supplied plan is authoritative: no fallback when it is invalid
  if (request.plan !== undefined) {
    const valid = validatePlan(request.plan, limits);
    if (!valid.success) return { success: false, error: valid.error, warnings };
    const extracted = extractAndNormalize(request.document, valid.plan.source.recordPath);
    if (!extracted.success) return { success: false, error: extracted.error, warnings };
    return {
      success: true,
      plan: valid.plan,
      origin: 'supplied',
      reason: 'Plan supplied by caller',
      recordPath: valid.plan.source.recordPath,
      candidates: [],
      sampleRow: extracted.sampleRow,
      attempts: 0,
      warnings: extracted.warnings
    };
  }

  // ---- record path + sample ----
  let recordPath = request.recordPath;
  let candidates: RecordPathCandidate[] = [];
  if (recordPath === undefined) {
    const found = discover(request.document, request.goalText);
    if (!found.success) return { success: false, error: found.error, warnings };
    recordPath = found.recordPath;
    candidates = found.candidates;
  }
  const extracted = extractAndNormalize(request.document, recordPath);
  if (!extracted.success) return { success: false, error: extracted.error, warnings };
  warnings.push(...extracted.warnings);
  const sampleRow = extracted.sampleRow;

  // ---- plan source ----
  let attempts = 0;
  if (options.source) {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    const previousErrors: string[] = [];
    while (attempts < maxAttempts) {
      attempts++;
      const r = await ask(options.source, {
        goalText: request.goalText, recordPath, sampleRow, attempt: attempts, previousErrors: [...previousErrors]
      }, limits);
      if (r === null) {
        warnings.push('Plan source declined; using a template');
        break;
      }
      if (r.success) {
        return {
          success: true, plan: r.plan, origin: 'source', reason: `Plan source (${r.strategy})`,
          recordPath, candidates, sampleRow, attempts, warnings
        };
      }
      const category: PlanFailureCategory = r.category;
      warnings.push(`Plan source attempt ${attempts} failed (${category}): ${r.error.message}`);
      previousErrors.push(...r.errors);
      if (!isRetryable(category)) break;
    }
  }

  // ---- template fallback ----
  const match = matchTemplate(request.goalText ?? '', recordPath, sampleRow);
  const valid = validatePlan(match.plan, limits);
  if (!valid.success) return { success: false, error: valid.error, warnings };
  return {
    success: true,
    plan: valid.plan,
    origin: 'template',
    templateId: match.templateId,
    reason: match.reason,
    recordPath,
    candidates,
    sampleRow,
    attempts,
    warnings
  };
}
