// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  ConnectionError,
  PagesQuerySchema,
  ReplicaError,
  SchemaError,
  SqlQuerySchema,
  StatementError,
  loadConfig
} from '@wikireplica/core';
import type { ReplicaConfig } from '@wikireplica/core';
import { queryPagesByWikiProject } from '@wikireplica/query';
import { ReplicaRegistry } from '@wikireplica/replica';
import type { TypedTable } from '@wikireplica/replica';
import { getTable, hasTable, tableNames } from '@wikireplica/tables';

export interface BuildAppOptions {
  config?: ReplicaConfig;
  /** Defaults to a mysql2-backed registry that logs through Fastify's logger. */
  registry?: ReplicaRegistry;
  logger?: FastifyServerOptions['logger'];
  rateLimitMax?: number;
}

export function classifyError(e: unknown): { code: string; status: number; message: string } {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof StatementError) return { code: 'STATEMENT', status: 422, message };
  if (e instanceof ConnectionError) return { code: 'CONNECTION', status: 502, message };
  if (e instanceof SchemaError) return { code: 'SCHEMA', status: 500, message };
  return { code: 'INTERNAL', status: 500, message };
}

// fastify's own client errors (bad JSON, rate limit) carry a 4xx statusCode
function clientStatus(e: unknown): number | null {
  if (e instanceof ReplicaError || !(e instanceof Error)) return null;
  const status = 'statusCode' in e && typeof e.statusCode === 'number' ? e.statusCode : null;
  return status !== null && status >= 400 && status < 500 ? status : null;
}

function tableResponse(table: TypedTable, startedAt: number) {
  return {
    ...table.toJSON(),
    meta: { rowCount: table.height, dbMs: Date.now() - startedAt }
  };
}

export async function buildApp(opts: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = opts.config ?? loadConfig();

  const app = Fastify({
    logger: opts.logger ?? { level: config.logLevel },
    bodyLimit: 1_000_000
  });

  const registry = opts.registry ?? new ReplicaRegistry({ config, logger: app.log });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.http.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.addHook('onClose', async () => {
    await registry.end();
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      const details = err.issues.map(i => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
      return reply.status(400).send({ code: 'VALIDATION', details, requestId: req.id });
    }

    const status = clientStatus(err);
    if (status !== null) {
      return reply.status(status).send({ code: 'REQUEST', message: err.message, requestId: req.id });
    }

    req.log.error({ err, requestId: req.id }, 'request-error');
    const c = classifyError(err);
    return reply.status(c.status).send({
      code: c.code,
      message: 'Request failed',
      error: c.message,
      requestId: req.id
    });
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/tables', async () => ({ tables: tableNames().map(getTable) }));

  app.get<{ Params: { name: string } }>('/tables/:name', async (req, reply) => {
    const { name } = req.params;
    if (!hasTable(name)) {
      return reply.code(404).send({ code: 'NOT_FOUND', message: `Unknown table: ${name}` });
    }
    return getTable(name);
  });

  // ------------------------------------
  // POST /query/pages  (pages by WikiProject)
  // ------------------------------------
  app.post('/query/pages', async (req) => {
    const q = PagesQuerySchema.parse(req.body ?? {});
    const t0 = Date.now();
    const db = registry.getOrCreate(q.project, q.extension ?? null);
    const table = await db.fetch(queryPagesByWikiProject(q.name, { quality: q.quality, priority: q.priority }));
    return tableResponse(table, t0);
  });

  // ------------------------------------
  // POST /query/sql  (raw statement, read-only transaction)
  // ------------------------------------
  app.post('/query/sql', async (req) => {
    const q = SqlQuerySchema.parse(req.body ?? {});
    const t0 = Date.now();
    const db = registry.getOrCreate(q.project, q.extension ?? null);
    req.log.debug({ host: db.host, sql: q.sql }, 'raw-statement');
    const table = await db.fetch(q.sql, { mode: q.mode, schemaOverrides: q.overrides });
    return tableResponse(table, t0);
  });

  return app;
}
