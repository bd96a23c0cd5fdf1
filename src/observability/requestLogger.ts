// src/observability/requestLogger.ts
// Request/response logging with timing.
//
// Context (requestId, actor, docId) is read from headers and route params.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger.js";
import { recordHttpRequest } from "./metrics.js";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  actorId?: string;
  docId?: string;
}

/* ---------- Context Extraction ---------- */

function extractDocId(req: FastifyRequest): string | undefined {
  const params = req.params;
  if (params && typeof params === "object" && "docId" in params) {
    const docId = params.docId;
    return typeof docId === "string" ? docId : undefined;
  }
  return undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  const actorId = req.headers["x-user-id"];
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    actorId: typeof actorId === "string" ? actorId : undefined,
    docId: extractDocId(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, { ...buildRequestContext(req) });
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Register request logging hooks:
 * - request start (debug)
 * - completion with status code and duration
 * - handler errors
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createRequestLogger(req).debug("request started");
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    const log = createChildLogger(baseLogger, {
      ...buildRequestContext(req),
      statusCode: reply.statusCode,
      duration,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }

    recordHttpRequest(
      req.method,
      req.routeOptions.url ?? "unmatched",
      reply.statusCode,
      duration / 1000
    );
    requestStartTimes.delete(req);
  });

  app.addHook("onError", async (req: FastifyRequest, _reply: FastifyReply, error: Error) => {
    createRequestLogger(req).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}
