// apps/http/src/config.ts
import { z } from 'zod';

const flag = z.enum(['0', '1', 'true', 'false']).default('0').transform(v => v === '1' || v === 'true');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BODY_LIMIT: z.coerce.number().int().positive().default(1_000_000),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  MAX_ROWS: z.coerce.number().int().positive().default(50_000),
  MAX_STEPS: z.coerce.number().int().positive().default(64),
  CSV_PREVIEW_ROWS: z.coerce.number().int().positive().default(20),
  DEBUG_ERRORS: flag
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  bodyLimit: number;
  corsOrigins: string[];   // empty = allow all
  rateLimitMax: number;
  maxRows: number;
  maxSteps: number;
  csvPreviewRows: number;
  debugErrors: boolean;
}

// unset and empty variables both take the default
function present(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(Object.entries(env).filter((e): e is [string, string] => typeof e[1] === 'string' && e[1] !== ''));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(present(env));
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    bodyLimit: e.BODY_LIMIT,
    corsOrigins: e.CORS_ORIGIN.split(',').map(s => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    maxRows: e.MAX_ROWS,
    maxSteps: e.MAX_STEPS,
    csvPreviewRows: e.CSV_PREVIEW_ROWS,
    debugErrors: e.DEBUG_ERRORS
  };
}
