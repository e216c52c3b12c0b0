import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { sql } from 'kysely';

import type { Database } from '../database/schema';
import { getContentType, getMetrics } from '../observability/metrics';

export interface HealthRouteOptions {
  db: Database;
  redis?: Redis;
  enableMetrics: boolean;
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthRouteOptions): void {
  const { db, redis } = options;

  /** Liveness probe: 200 while the process is up */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: database, plus Redis when configured */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    let start = Date.now();
    try {
      await sql`select 1`.execute(db);
      checks.database = { status: 'ok', latencyMs: Date.now() - start };
    } catch {
      checks.database = { status: 'error', latencyMs: Date.now() - start };
    }

    if (redis) {
      start = Date.now();
      try {
        await redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (options.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
