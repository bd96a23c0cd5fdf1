// src/app.ts
// Application assembly: services, Fastify instance, plugins and routes.
// server.ts binds it to a port; tests drive it through app.inject().

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import type { DbAdapter } from './db/types.js';
import { registerRateLimit } from './middleware/rateLimit.js';
import { getLogLevel, registerObservability, requestIdGenerator } from './observability/index.js';
import { ReceiptService } from './receipts/service.js';
import { createHealthRoutes } from './routes/health.js';
import { httpErrorHandler } from './routes/httpErrors.js';
import metricsRoutes from './routes/metrics.js';
import { createReceiptRoutes } from './routes/receipts.js';
import { createVerificationRoutes } from './routes/verification.js';
import { createAuditLog, type AuditLog } from './store/audit.js';
import { systemClock, type Clock } from './utils/clock.js';
import { CodeIssuer } from './verification/codeIssuer.js';
import { VerificationGate } from './verification/gate.js';
import { TokenIssuer } from './verification/tokenIssuer.js';

export interface Services {
  receipts: ReceiptService;
  gate: VerificationGate;
  audit: AuditLog;
}

export function createServices(db: DbAdapter, config: AppConfig, now: Clock = systemClock): Services {
  const { verification } = config;
  const audit = createAuditLog(db);

  const codes = new CodeIssuer(db, {
    ttlSeconds: verification.codeTtlSeconds,
    maxAttempts: verification.codeMaxAttempts,
    now,
  });
  const tokens = new TokenIssuer({
    secret: verification.tokenSigningSecret,
    issuer: verification.tokenIssuer,
    defaultTtlSeconds: verification.tokenTtlSeconds,
    now,
  });

  return {
    receipts: new ReceiptService(db, { now }),
    gate: new VerificationGate({ db, codes, tokens, audit, now }),
    audit,
  };
}

export interface CreateAppOptions {
  db: DbAdapter;
  config: AppConfig;
  now?: Clock;
  /** Prebuilt services, e.g. to attach unlock listeners before serving. */
  services?: Services;
}

export async function createApp(options: CreateAppOptions): Promise<FastifyInstance> {
  const { db, config } = options;
  const services = options.services ?? createServices(db, config, options.now);

  const app = Fastify({
    logger: { level: getLogLevel() },
    disableRequestLogging: true,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);
  app.setErrorHandler(httpErrorHandler);

  await app.register(cors, { origin: config.cors.origins });

  // Must be registered before any route that opts in.
  await registerRateLimit(app);

  await app.register(createHealthRoutes(db));
  await app.register(metricsRoutes);
  await app.register(createReceiptRoutes(services.receipts));
  await app.register(createVerificationRoutes(services.gate, services.audit, config));

  return app;
}
