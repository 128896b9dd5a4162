import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { getContentType, getMetrics } from '../observability/metrics';
import { Database } from '../persistence/database';

export interface HealthDependencies {
  database?: Database;
  redis?: Redis;
}

type CheckResult = { status: 'ok' | 'error' | 'skipped'; latencyMs?: number };

async function probe(name: string, check: (() => Promise<unknown>) | undefined): Promise<CheckResult> {
  if (!check) return { status: 'skipped' };
  const start = Date.now();
  try {
    await check();
    return { status: 'ok', latencyMs: Date.now() - start };
  } catch (err) {
    logger.warn({ err, dependency: name }, 'Readiness check failed');
    return { status: 'error', latencyMs: Date.now() - start };
  }
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDependencies = {}): void {
  /** Liveness probe: 200 while the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: checks the database and Redis */
  app.get('/ready', async (_req, reply) => {
    const { database, redis } = deps;
    const checks: Record<string, CheckResult> = {
      database: await probe('database', database && (() => database.ping())),
      redis: await probe('redis', redis && (() => redis.ping())),
    };

    const allOk = Object.values(checks).every((c) => c.status !== 'error');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
