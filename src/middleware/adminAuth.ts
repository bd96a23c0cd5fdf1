// src/middleware/adminAuth.ts
// Guard for internal endpoints (code/token issuance, re-lock, audit read).
// Callers present the shared key in the x-admin-key header.

import crypto from 'node:crypto';
import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { createLogger } from '../observability/logger.js';

const log = createLogger('middleware/adminAuth');

export const ADMIN_KEY_HEADER = 'x-admin-key';

function keysMatch(expected: string, presented: string): boolean {
  const a = crypto.createHash('sha256').update(expected).digest();
  const b = crypto.createHash('sha256').update(presented).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * preHandler rejecting requests without the admin key.
 * With no key configured the admin surface is disabled (503).
 */
export function requireAdmin(apiKey: string): preHandlerAsyncHookHandler {
  return async function adminGuard(req: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) {
      return reply.code(503).send({
        error: 'admin_disabled',
        message: 'Admin API key is not configured',
      });
    }

    const presented = req.headers[ADMIN_KEY_HEADER];
    if (typeof presented !== 'string' || !keysMatch(apiKey, presented)) {
      log.warn({ url: req.url, ip: req.ip }, 'Rejected admin request');
      return reply.code(401).send({
        error: 'unauthorized',
        message: 'Valid admin key required',
      });
    }
  };
}
