// packages/core/src/schemas.ts
import { z } from 'zod';
import type { Condition, JsonValue, Operand } from './types.js';

// recursive JSON value
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const RowSchema = z.record(JsonValueSchema);

// shared op sets
export const CompareOpEnum = z.enum([
  'eq', 'neq',
  'gt', 'gte', 'lt', 'lte',
  'in', 'contains'
]);

export const MetricFnEnum = z.enum(['sum', 'count', 'avg', 'min', 'max']);
export type MetricFn = z.infer<typeof MetricFnEnum>;

export const TypeHintEnum = z.enum(['string', 'number', 'integer', 'boolean', 'null', 'array', 'object', 'unknown']);
export type TypeHint = z.infer<typeof TypeHintEnum>;

// any object carrying a string `field` is a reference; other keys are ignored
export const FieldOperandSchema = z.object({ field: z.string().min(1) }).passthrough();

export const OperandSchema: z.ZodType<Operand> = z.union([FieldOperandSchema, JsonValueSchema]);

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.union([
    z.object({ op: CompareOpEnum, left: OperandSchema, right: OperandSchema }),
    z.object({ op: z.enum(['and', 'or']), items: z.array(ConditionSchema).min(1) }),
    z.object({ op: z.literal('not'), items: z.array(ConditionSchema).length(1) })
  ])
);

// ---- step payloads ----
export const FieldSpecSchema = z.object({
  from: z.string().min(1),
  as: z.string().min(1),
  typeHint: TypeHintEnum.optional()
});
export type FieldSpec = z.infer<typeof FieldSpecSchema>;

export const ComputeSpecSchema = z.object({
  as: z.string().min(1),
  expr: z.string().min(1),
  typeHint: TypeHintEnum.optional()
});
export type ComputeSpec = z.infer<typeof ComputeSpecSchema>;

export const MapSpecSchema = z.object({
  from: z.string().min(1),
  as: z.string().min(1),
  mapping: z.record(JsonValueSchema),
  default: JsonValueSchema.optional()
});
export type MapSpec = z.infer<typeof MapSpecSchema>;

export const MetricSpecSchema = z.object({
  as: z.string().min(1),
  fn: MetricFnEnum,
  field: z.string().min(1).optional(),
  expr: z.string().min(1).optional()
});
export type MetricSpec = z.infer<typeof MetricSpecSchema>;

const lower = (v: unknown) => (typeof v === 'string' ? v.toLowerCase() : v);
export const SortDirSchema = z.preprocess(lower, z.enum(['asc', 'desc'])).default('asc');

// ---- steps (tagged on op) ----
export const PlanStepSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('select'), fields: z.array(FieldSpecSchema).min(1) }),
  z.object({ op: z.literal('filter'), where: z.union([ConditionSchema, z.string().min(1)]) }),
  z.object({ op: z.literal('compute'), compute: z.array(ComputeSpecSchema).min(1) }),
  z.object({ op: z.literal('mapValue'), map: z.array(MapSpecSchema).min(1) }),
  z.object({ op: z.literal('sort'), by: z.string().min(1), dir: SortDirSchema }),
  z.object({ op: z.literal('groupBy'), keys: z.array(z.string().min(1)).min(1) }),
  z.object({ op: z.literal('aggregate'), metrics: z.array(MetricSpecSchema).min(1) }),
  z.object({ op: z.literal('limit'), n: z.number().int().positive() })
]);
export type PlanStep = z.infer<typeof PlanStepSchema>;
export type PlanOp = PlanStep['op'];
export type StepOf<K extends PlanOp> = Extract<PlanStep, { op: K }>;

export const PLAN_OPS: readonly PlanOp[] = [
  'select', 'filter', 'compute', 'mapValue', 'sort', 'groupBy', 'aggregate', 'limit'
];

/**
 * Informational only. Validated, defaulted and returned with the plan for
 * collaborators that read plans back; the executor reads none of these
 * fields (renames are always explicit, field matching is locale-neutral).
 */
export const PlanPolicySchema = z.object({
  renamePolicy: z.enum(['ExplicitOnly', 'Auto']).default('ExplicitOnly'),
  shapePolicy: z.literal('ArrayOfObjects').default('ArrayOfObjects'),
  schemaMode: z.literal('Permissive').default('Permissive'),
  locale: z.string().default('auto')
});

export const PLAN_VERSION = '1.0';

export const TransformPlanSchema = z.object({
  planVersion: z.literal(PLAN_VERSION).default(PLAN_VERSION),
  source: z.object({ recordPath: z.string() }),
  policy: PlanPolicySchema.optional(),
  steps: z.array(PlanStepSchema)
});
export type TransformPlan = z.infer<typeof TransformPlanSchema>;
export type TransformPlanInput = z.input<typeof TransformPlanSchema>;
