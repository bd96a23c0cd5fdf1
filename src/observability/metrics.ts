// src/observability/metrics.ts
// Prometheus metrics (prom-client), exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "receipt_gate";
export const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "receipt-gate",
});

if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

/* ---------- Verification Metrics ---------- */

export const verificationAttemptsTotal = new Counter({
  name: `${METRICS_PREFIX}_verification_attempts_total`,
  help: "Verification attempts by method and outcome",
  labelNames: ["method", "outcome"] as const,
  registers: [registry],
});

export const verificationCodesIssuedTotal = new Counter({
  name: `${METRICS_PREFIX}_verification_codes_issued_total`,
  help: "Short numeric verification codes issued",
  registers: [registry],
});

export const verificationTokensIssuedTotal = new Counter({
  name: `${METRICS_PREFIX}_verification_tokens_issued_total`,
  help: "Signed verification tokens issued",
  registers: [registry],
});

export const lockTransitionsTotal = new Counter({
  name: `${METRICS_PREFIX}_lock_transitions_total`,
  help: "Lock state transitions by kind",
  labelNames: ["transition"] as const,
  registers: [registry],
});

/* ---------- Receipt Metrics ---------- */

export const receiptsCreatedTotal = new Counter({
  name: `${METRICS_PREFIX}_receipts_created_total`,
  help: "Receipts created",
  registers: [registry],
});

/* ---------- Helpers ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number
): void {
  if (!METRICS_ENABLED) return;
  httpRequestsTotal.inc({ method, route, status_code: String(statusCode) });
  httpRequestDuration.observe({ method, route }, durationSeconds);
}

export function recordVerification(method: string, outcome: string): void {
  if (!METRICS_ENABLED) return;
  verificationAttemptsTotal.inc({ method, outcome });
}

export function recordLockTransition(transition: "unlocked" | "relocked"): void {
  if (!METRICS_ENABLED) return;
  lockTransitionsTotal.inc({ transition });
}

export function recordCodeIssued(): void {
  if (!METRICS_ENABLED) return;
  verificationCodesIssuedTotal.inc();
}

export function recordTokenIssued(): void {
  if (!METRICS_ENABLED) return;
  verificationTokensIssuedTotal.inc();
}

export function recordReceiptCreated(): void {
  if (!METRICS_ENABLED) return;
  receiptsCreatedTotal.inc();
}
