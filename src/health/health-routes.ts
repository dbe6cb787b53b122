import { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { SessionStore } from '../session/types';

export function registerHealthRoutes(app: FastifyInstance, store: SessionStore, storeBackend: 'redis' | 'memory'): void {
  /** Liveness probe: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: checks the session store */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; backend?: string; latencyMs?: number }> = {};

    const start = Date.now();
    const ok = await store.ping();
    checks.sessionStore = { status: ok ? 'ok' : 'error', backend: storeBackend, latencyMs: Date.now() - start };

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
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
