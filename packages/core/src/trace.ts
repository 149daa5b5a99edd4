// packages/core/src/trace.ts
// Execution trace types (returned to callers in debug mode)

export interface StepTrace {
  index: number;
  op: string;
  inputRows: number;
  outputRows: number;
  ms: number;
}

export type PlanOrigin = 'supplied' | 'source' | 'template';

export interface ExecutionTrace {
  recordPath: string;
  extractedRows: number;
  steps: StepTrace[];

  // ---- filled in by the HTTP layer ----
  origin?: PlanOrigin;
  templateId?: string;
  planMs?: number;     // discovery + plan resolution
  execMs?: number;     // execute()
  rowCount?: number;
  errorCode?: string;  // mapped taxonomy code when the request failed
}
