// src/observability/healthCheck.ts
// Health checks for readiness/liveness probes.

import type { DbAdapter } from "../db/types.js";
import { createLogger } from "./logger.js";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
  };
}

const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

async function checkDatabase(db: DbAdapter): Promise<HealthCheckResult> {
  const start = Date.now();

  try {
    const result = await db.queryOne<{ ok: number }>("SELECT 1 AS ok");

    if (result?.ok === 1) {
      return { status: "up", latency: Date.now() - start };
    }

    return {
      status: "down",
      latency: Date.now() - start,
      error: "Unexpected query result",
    };
  } catch (err) {
    log.error({ err }, "Database health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export async function getHealthStatus(db: DbAdapter): Promise<HealthStatus> {
  const database = await checkDatabase(db);

  return {
    status: database.status === "up" ? "healthy" : "unhealthy",
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { database },
  };
}
