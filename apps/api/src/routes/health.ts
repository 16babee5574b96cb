// =============================================================================
// Calmpoint API — Health check route
// GET /health  →  200 { status: 'ok', ... } | 503 { status: 'degraded', ... }
// =============================================================================

import type { FastifyInstance } from 'fastify';

export interface HealthRouteOptions {
  checkDb: () => Promise<unknown>;
}

export default async function healthRoutes(fastify: FastifyInstance, opts: HealthRouteOptions): Promise<void> {
  fastify.get('/health', { logLevel: 'silent' }, async (_request, reply) => {
    let dbOk = false;
    try {
      await opts.checkDb();
      dbOk = true;
    } catch (err) {
      fastify.log.warn({ err }, 'Health check: DB unreachable');
    }

    const status = dbOk ? 'ok' : 'degraded';
    const httpStatus = dbOk ? 200 : 503;

    return reply.status(httpStatus).send({
      status,
      timestamp: new Date().toISOString(),
      version: process.env['npm_package_version'] ?? '0.1.0',
      db: dbOk ? 'connected' : 'unreachable',
    });
  });
}
