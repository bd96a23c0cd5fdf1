// src/observability/requestId.ts
// Request ID generation and propagation.
//
// Accepts an upstream X-Request-ID for correlation; otherwise mints a nanoid.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "node:http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21;
const MAX_INCOMING_ID_LENGTH = 128;

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Custom request ID generator for Fastify configuration.
 * Use in Fastify({ genReqId: requestIdGenerator }); genReqId receives the raw IncomingMessage.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (
    typeof incomingId === "string" &&
    incomingId.length > 0 &&
    incomingId.length <= MAX_INCOMING_ID_LENGTH
  ) {
    return incomingId;
  }

  return generateRequestId();
}

/** Echo the request ID on every response. */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
