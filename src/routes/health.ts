// src/routes/health.ts
// - GET /health        full status with dependency checks
// - GET /health/ready  readiness probe (database reachable)
// - GET /health/live   liveness probe

import type { FastifyPluginAsync } from 'fastify';
import type { DbAdapter } from '../db/types.js';
import { getHealthStatus } from '../observability/healthCheck.js';

export function createHealthRoutes(db: DbAdapter): FastifyPluginAsync {
  return async (app) => {
    app.get('/health', async (_req, reply) => {
      const health = await getHealthStatus(db);
      return reply.code(health.status === 'healthy' ? 200 : 503).send(health);
    });

    app.get('/health/ready', async (_req, reply) => {
      const health = await getHealthStatus(db);
      const ready = health.status === 'healthy';
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get('/health/live', async () => ({ alive: true }));
  };
}
