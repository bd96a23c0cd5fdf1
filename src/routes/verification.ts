// src/routes/verification.ts
// Verification and lock-state endpoints.
//
// Public:
// - POST /ingest/receipt-code/verify           { doc_id, code6 | signed_token } -> { verified, unlocked }
// - GET  /documents/:docId/lock-state
// Admin (x-admin-key):
// - POST /documents/:docId/verification-code   -> { code, expires_at }   (raw code shown once)
// - POST /documents/:docId/verification-token  { issuer?, ttl_seconds? } -> { token, expires_at }
// - POST /documents/:docId/relock
// - GET  /documents/:docId/audit

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import { requireAdmin } from '../middleware/adminAuth.js';
import { clientIpKey, routeRateLimit } from '../middleware/rateLimit.js';
import { collectHistory, type AuditEntry, type AuditLog } from '../store/audit.js';
import { isWellFormedCode } from '../verification/codeIssuer.js';
import type { VerificationGate } from '../verification/gate.js';
import type { VerificationRequest } from '../verification/types.js';
import { isRecord, nonEmptyString, parsePositiveInt, type Parsed } from './parse.js';

interface DocParams {
  docId: string;
}

export const ANONYMOUS_ACTOR = 'anonymous';

/** Upper bound for ttl_seconds on token issuance (one year). */
export const MAX_TOKEN_TTL_SECONDS = 365 * 24 * 60 * 60;

function actorOf(req: FastifyRequest): string {
  const header = req.headers['x-user-id'];
  return typeof header === 'string' && header.trim() ? header.trim() : ANONYMOUS_ACTOR;
}

/** Exactly one of code6 / signed_token must be present. */
export function parseVerifyBody(body: unknown): Parsed<VerificationRequest> {
  if (!isRecord(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }
  // Taken verbatim, like the :docId path parameter it must match.
  const docId = body.doc_id;
  if (typeof docId !== 'string' || docId.length === 0) {
    return { ok: false, message: 'doc_id is required' };
  }

  const hasCode = body.code6 !== undefined && body.code6 !== null;
  const hasToken = body.signed_token !== undefined && body.signed_token !== null;
  if (hasCode === hasToken) {
    return { ok: false, message: 'Provide exactly one of code6 or signed_token' };
  }

  if (hasCode) {
    if (typeof body.code6 !== 'string' || !isWellFormedCode(body.code6)) {
      return { ok: false, message: 'code6 must be 6 digits' };
    }
    return { ok: true, value: { method: 'code', docId, code: body.code6 } };
  }

  const token = nonEmptyString(body.signed_token);
  if (!token) {
    return { ok: false, message: 'signed_token must be a non-empty string' };
  }
  return { ok: true, value: { method: 'token', docId, token } };
}

function serializeAuditEntry(entry: AuditEntry) {
  return {
    id: entry.id,
    doc_id: entry.docId,
    actor: entry.actor,
    method: entry.method,
    outcome: entry.outcome,
    reason: entry.reason,
    transition: entry.transition,
    at: new Date(entry.at).toISOString(),
  };
}

/* ---------- Plugin ---------- */

export function createVerificationRoutes(
  gate: VerificationGate,
  audit: AuditLog,
  config: Pick<AppConfig, 'admin' | 'rateLimit'>
): FastifyPluginAsync {
  const adminOnly = { preHandler: requireAdmin(config.admin.apiKey) };
  const verifyLimit = routeRateLimit({
    max: config.rateLimit.verifyMax,
    timeWindow: config.rateLimit.verifyTimeWindow,
    keyGenerator: clientIpKey,
  });

  return async (app) => {
    app.post<{ Body: unknown }>('/ingest/receipt-code/verify', verifyLimit, async (req, reply) => {
      const parsed = parseVerifyBody(req.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: 'validation', message: parsed.message });
      }

      // Rejections are thrown as VerificationError and answered uniformly by the error handler.
      const result = await gate.verify(parsed.value, actorOf(req));
      return { verified: result.verified, unlocked: result.unlocked };
    });

    app.get<{ Params: DocParams }>('/documents/:docId/lock-state', async (req, reply) => {
      const state = await gate.getLockState(req.params.docId);
      if (!state) {
        return reply.code(404).send({ error: 'not_found', message: 'Document not registered' });
      }
      return { sensitive_input_locked: state.sensitiveInputLocked };
    });

    app.post<{ Params: DocParams }>('/documents/:docId/verification-code', adminOnly, async (req, reply) => {
      const issued = await gate.issueCode(req.params.docId);
      return reply.code(201).send({
        code: issued.code,
        expires_at: new Date(issued.expiresAt).toISOString(),
      });
    });

    app.post<{ Params: DocParams; Body: unknown }>(
      '/documents/:docId/verification-token',
      adminOnly,
      async (req, reply) => {
        const body = isRecord(req.body) ? req.body : {};

        let issuer: string | undefined;
        if (body.issuer !== undefined) {
          const value = nonEmptyString(body.issuer);
          if (!value) {
            return reply.code(400).send({ error: 'validation', message: 'issuer must be a non-empty string' });
          }
          issuer = value;
        }

        let ttlSeconds: number | undefined;
        if (body.ttl_seconds !== undefined) {
          const value = parsePositiveInt(body.ttl_seconds);
          if (!value || value > MAX_TOKEN_TTL_SECONDS) {
            return reply.code(400).send({
              error: 'validation',
              message: `ttl_seconds must be a positive integer no greater than ${MAX_TOKEN_TTL_SECONDS}`,
            });
          }
          ttlSeconds = value;
        }

        const issued = await gate.issueToken(req.params.docId, issuer, ttlSeconds);
        return reply.code(201).send({
          token: issued.token,
          expires_at: new Date(issued.expiresAt).toISOString(),
        });
      }
    );

    app.post<{ Params: DocParams }>('/documents/:docId/relock', adminOnly, async (req) => {
      const state = await gate.relock(req.params.docId, actorOf(req));
      return { sensitive_input_locked: state.sensitiveInputLocked };
    });

    app.get<{ Params: DocParams }>('/documents/:docId/audit', adminOnly, async (req) => {
      const entries = await collectHistory(audit, req.params.docId);
      return { entries: entries.map(serializeAuditEntry) };
    });
  };
}
