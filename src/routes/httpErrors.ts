// src/routes/httpErrors.ts
// Maps domain errors to HTTP responses. Installed as the app's error handler.

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import {
  CanonicalFormatError,
  DuplicateKeyError,
  InvalidFactError,
  ReceiptNotFoundError,
} from '../receipts/errors.js';
import {
  AuditUnavailableError,
  DocumentNotFoundError,
  SigningKeyUnavailableError,
  VerificationError,
} from '../verification/errors.js';

export interface HttpErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/** Every rejected verification gets this body, whatever the reason. */
export const VERIFICATION_FAILED_BODY = {
  verified: false,
  unlocked: false,
  error: 'verification_failed',
} as const;

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return 'Request failed';
}

export function toHttpError(err: unknown): HttpErrorResponse {
  if (err instanceof VerificationError) {
    return { status: 403, body: { ...VERIFICATION_FAILED_BODY } };
  }
  if (err instanceof AuditUnavailableError) {
    return { status: 503, body: { error: 'audit_unavailable', message: 'Verification temporarily unavailable' } };
  }
  if (err instanceof SigningKeyUnavailableError) {
    return { status: 503, body: { error: 'signing_key_unavailable', message: err.message } };
  }
  if (err instanceof DuplicateKeyError || err instanceof InvalidFactError) {
    return { status: 400, body: { error: 'invalid_facts', message: err.message } };
  }
  if (err instanceof DocumentNotFoundError || err instanceof ReceiptNotFoundError) {
    return { status: 404, body: { error: 'not_found', message: err.message } };
  }
  if (err instanceof CanonicalFormatError) {
    return { status: 500, body: { error: 'corrupt_receipt', message: 'Stored receipt could not be decoded' } };
  }

  // Framework errors (body parsing, rate limiting) carry their own 4xx status.
  const status = statusCodeOf(err);
  if (status === 429) {
    return { status, body: { error: 'rate_limited', message: messageOf(err) } };
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return { status, body: { error: 'bad_request', message: messageOf(err) } };
  }

  return { status: 500, body: { error: 'internal_error', message: 'Internal server error' } };
}

export function httpErrorHandler(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  const { status, body } = toHttpError(err);

  if (status >= 500) {
    req.log.error({ err }, 'Request failed');
  } else if (err instanceof VerificationError) {
    req.log.info({ reason: err.reason, outcome: err.outcome }, 'Verification failed');
  }
  return reply.code(status).send(body);
}
