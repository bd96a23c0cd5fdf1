// src/routes/metrics.ts
// GET /metrics: Prometheus exposition of the registry.

import type { FastifyInstance } from 'fastify';
import { registry } from '../observability/metrics.js';

export default async function metricsRoutes(app: FastifyInstance) {
  app.get('/metrics', async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header('Content-Type', registry.contentType).send(metrics);
    } catch (err) {
      app.log.error({ err }, 'Failed to collect metrics');
      return reply.code(500).send({ error: 'Failed to collect metrics' });
    }
  });
}
