// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ExecutionTrace, JsonValue } from '@rowsmith/core';
import { JsonValueSchema, RowSchema, TransformError } from '@rowsmith/core';
import { execute, toCsv, validatePlan } from '@rowsmith/engine';
import type { PlanLimits } from '@rowsmith/engine';
import { aliasIndex, discover, discoveryWords, extractAndNormalize, inferSchema, resolveField } from '@rowsmith/shape';
import type { PlanSource } from '@rowsmith/planner';
import { matchTemplate, resolvePlan, textPlanSource } from '@rowsmith/planner';
import type { AppConfig } from './config.js';
import { classifyError, zodDetails } from './errors.js';

export interface AppOptions {
  // consulted by /preview/transform when the body carries neither plan nor planText
  planSource?: PlanSource;
  examplesDir?: string;
}

export const DEFAULT_EXAMPLES_DIR = fileURLToPath(new URL('../../../examples/plans/', import.meta.url));

// ---------- request bodies ----------
const PreviewBody = z.object({
  sampleInput: JsonValueSchema,
  goalText: z.string().optional(),
  plan: z.unknown().optional(),
  planText: z.string().optional(),
  recordPath: z.string().optional(),
  includeCsv: z.boolean().default(false)
});

const DiscoverBody = z.object({
  document: JsonValueSchema,
  goalText: z.string().optional()
});

const SynthesizeBody = z.object({
  goalText: z.string(),
  sampleInput: JsonValueSchema,
  recordPath: z.string().optional()
});

const ValidateBody = z.object({ plan: z.unknown() });
const InferBody = z.object({ rows: z.array(RowSchema) });
const ResolveBody = z.object({ field: z.string(), sampleRow: RowSchema });

const DebugQuery = z.object({ debug: z.string().optional(), refresh: z.string().optional() }).passthrough();
const ExampleParams = z.object({ name: z.string() });

function queryOf(req: FastifyRequest): z.infer<typeof DebugQuery> {
  const q = DebugQuery.safeParse(req.query);
  return q.success ? q.data : {};
}

function shouldDebug(req: FastifyRequest, cfg: AppConfig): boolean {
  const h = req.headers['x-debug'];
  return queryOf(req).debug === '1' || h === '1' || cfg.debugErrors;
}

const elapsed = (t0: number) => Math.round((performance.now() - t0) * 1000) / 1000;

export async function buildApp(cfg: AppConfig, options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: cfg.logLevel },
    bodyLimit: cfg.bodyLimit
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || cfg.corsOrigins.length === 0 || cfg.corsOrigins.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: cfg.rateLimitMax,
    timeWindow: '1 minute'
  });

  const limits: PlanLimits = { maxRows: cfg.maxRows, maxSteps: cfg.maxSteps };

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { code, status, message } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.info({ code, requestId: req.id }, 'request-rejected');

    const details = err instanceof ZodError ? zodDetails(err)
      : err instanceof TransformError ? err.details
      : undefined;
    const trace: Pick<ExecutionTrace, 'errorCode'> | undefined = shouldDebug(req, cfg) ? { errorCode: code } : undefined;
    return reply.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(details ? { details } : {}),
      ...(trace ? { trace } : {})
    });
  });

  // ------------------------------------
  // POST /preview/transform
  // ------------------------------------
  app.post('/preview/transform', async (req) => {
    const body = PreviewBody.parse(req.body);
    const debug = shouldDebug(req, cfg);

    const t0 = performance.now();
    const source = body.planText !== undefined ? textPlanSource(body.planText) : options.planSource;
    const resolved = await resolvePlan(
      { document: body.sampleInput, goalText: body.goalText, recordPath: body.recordPath, plan: body.plan },
      { source, limits }
    );
    if (!resolved.success) throw new TransformError(resolved.error);
    const planMs = elapsed(t0);
    req.log.info({ recordPath: resolved.recordPath, origin: resolved.origin, templateId: resolved.templateId }, 'plan-resolved');

    const t1 = performance.now();
    const result = execute(resolved.plan, body.sampleInput, limits);
    if (!result.success) throw new TransformError(result.error);
    const execMs = elapsed(t1);

    const warnings = [...resolved.warnings, ...result.warnings];
    if (warnings.length) req.log.warn({ warnings }, 'transform-warnings');

    const rowCount = result.rows.length;
    const trace: ExecutionTrace = {
      ...result.trace,
      origin: resolved.origin,
      templateId: resolved.templateId,
      planMs,
      execMs,
      rowCount
    };
    return {
      plan: resolved.plan,
      origin: resolved.origin,
      ...(resolved.templateId ? { templateId: resolved.templateId } : {}),
      reason: resolved.reason,
      rows: result.rows,
      outputSchema: inferSchema(result.rows),
      ...(body.includeCsv ? { csvPreview: toCsv(result.rows, { maxRows: cfg.csvPreviewRows }) } : {}),
      warnings,
      meta: { recordPath: resolved.recordPath, rowCount, planMs, execMs },
      ...(debug ? { trace } : {})
    };
  });

  // ------------------------------------
  // POST /discover
  // ------------------------------------
  app.post('/discover', async (req) => {
    const body = DiscoverBody.parse(req.body);
    const found = discover(body.document, body.goalText);
    if (!found.success) throw new TransformError(found.error);
    req.log.info({ recordPath: found.recordPath, score: found.score }, 'record-path-discovered');
    return { recordPath: found.recordPath, score: found.score, candidates: found.candidates };
  });

  // ------------------------------------
  // POST /plan/synthesize
  // ------------------------------------
  app.post('/plan/synthesize', async (req) => {
    const body = SynthesizeBody.parse(req.body);
    let recordPath = body.recordPath;
    if (recordPath === undefined) {
      const found = discover(body.sampleInput, body.goalText);
      if (!found.success) throw new TransformError(found.error);
      recordPath = found.recordPath;
    }
    const extracted = extractAndNormalize(body.sampleInput, recordPath);
    if (!extracted.success) throw new TransformError(extracted.error);
    const match = matchTemplate(body.goalText, recordPath, extracted.sampleRow);
    return { plan: match.plan, templateId: match.templateId, reason: match.reason, recordPath };
  });

  // ------------------------------------
  // POST /plan/validate
  // ------------------------------------
  app.post('/plan/validate', async (req) => {
    const body = ValidateBody.parse(req.body);
    const v = validatePlan(body.plan, limits);
    return v.success
      ? { valid: true, errors: [], plan: v.plan }
      : { valid: false, code: v.error.code, errors: v.errors };
  });

  app.post('/schema/infer', async (req) => inferSchema(InferBody.parse(req.body).rows));

  app.post('/fields/resolve', async (req) => {
    const body = ResolveBody.parse(req.body);
    return resolveField(body.field, body.sampleRow);
  });

  // ------------------------------------
  // GET /examples  (serve examples/plans/*.json)
  // ------------------------------------
  const examplesDir = path.resolve(options.examplesDir ?? DEFAULT_EXAMPLES_DIR);
  const examplesCache = new Map<string, JsonValue>();

  function readExample(file: string): JsonValue {
    const hit = examplesCache.get(file);
    if (hit !== undefined) return hit;
    const json = JsonValueSchema.parse(JSON.parse(fs.readFileSync(path.join(examplesDir, file), 'utf8')));
    examplesCache.set(file, json);
    return json;
  }

  app.get('/examples', async () => {
    if (!fs.existsSync(examplesDir)) return { files: [], note: 'examples/plans not found' };
    const files = fs.readdirSync(examplesDir).filter(f => f.endsWith('.json')).sort();
    return {
      files: files.map(f => {
        try {
          return { name: f, json: readExample(f) };
        } catch (e) {
          return { name: f, error: e instanceof Error ? e.message : String(e) };
        }
      })
    };
  });

  app.get('/examples/:name', async (req, reply) => {
    const raw = ExampleParams.parse(req.params).name;
    if (!/^[a-z0-9._-]+\.json$/i.test(raw)) {
      return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid filename' });
    }
    const abs = path.resolve(examplesDir, raw);
    if (!abs.startsWith(examplesDir + path.sep)) return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid path' });
    if (!fs.existsSync(abs)) return reply.code(404).send({ code: 'NOT_FOUND' });

    if (queryOf(req).refresh === '1') examplesCache.delete(raw);
    try {
      return reply.send(readExample(raw));
    } catch (e) {
      return reply.code(500).send({ code: 'EXAMPLES_ERROR', message: e instanceof Error ? e.message : String(e) });
    }
  });

  // ------------------------------------
  // health
  // ------------------------------------
  app.get('/healthz', async () => ({ ok: true }));

  // ready once the packaged word lists load
  app.get('/readyz', async (req, reply) => {
    try {
      const aliases = aliasIndex().size;
      const collectionNames = discoveryWords().collectionNames.size;
      return { ok: true, data: { aliases, collectionNames }, examples: fs.existsSync(examplesDir) };
    } catch (err) {
      req.log.error({ err }, 'readiness-failed');
      return reply.code(503).send({ ok: false, error: err instanceof Error ? err.message : String(err) });
    }
  });

  return app;
}
