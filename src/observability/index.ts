// src/observability/index.ts
// Central export point for logging, request IDs, metrics and health.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger.js";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
} from "./requestId.js";

/* ---------- Request Logger ---------- */
export { createRequestLogger, registerRequestLogger } from "./requestLogger.js";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordVerification,
  recordLockTransition,
  recordCodeIssued,
  recordTokenIssued,
  recordReceiptCreated,
  METRICS_ENABLED,
} from "./metrics.js";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck.js";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId.js";
import { registerRequestLogger } from "./requestLogger.js";

/**
 * Register request ID and request logging hooks.
 * Call right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
}
