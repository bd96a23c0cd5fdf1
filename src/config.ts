/* src/config.ts
   Centralized runtime configuration (env-driven, cached) */
import 'dotenv/config';

export type NodeEnv = 'development' | 'production' | 'test';

export interface AppConfig {
  nodeEnv: NodeEnv;

  server: {
    port: number;
    host: string;
  };

  database: {
    path: string;
  };

  cors: {
    origins: string[];
  };

  // ── Verification (codes + tokens) ────────────────────────────────
  verification: {
    codeTtlSeconds: number;
    codeMaxAttempts: number;
    tokenTtlSeconds: number;
    tokenIssuer: string;
    tokenSigningSecret: string;
  };

  // ── Internal/admin surface (issuance, re-lock, audit read) ───────
  admin: {
    apiKey: string;
  };

  // ── HTTP-level throttling of the verify route ────────────────────
  rateLimit: {
    verifyMax: number;
    verifyTimeWindow: string;
  };
}

type Env = Record<string, string | undefined>;

const DEV_SIGNING_SECRET = 'dev-receipt-gate-secret-do-not-use-in-production';

function env(source: Env, name: string, fallback?: string): string {
  return (source[name] ?? fallback ?? '').toString();
}

function envInt(source: Env, name: string, fallback: number): number {
  const val = parseInt(env(source, name, ''), 10);
  return Number.isNaN(val) || val <= 0 ? fallback : val;
}

function resolveNodeEnv(source: Env): NodeEnv {
  const value = env(source, 'NODE_ENV', 'development');
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

function resolveSigningSecret(source: Env, nodeEnv: NodeEnv): string {
  const secret = env(source, 'TOKEN_SIGNING_SECRET', '');

  if (nodeEnv === 'production' && !secret) {
    throw new Error('TOKEN_SIGNING_SECRET is required in production mode');
  }

  return secret || DEV_SIGNING_SECRET;
}

/**
 * Build a config object from an environment map.
 * Exposed separately from getConfig() so tests can feed a synthetic env.
 */
export function loadConfig(source: Env = process.env): AppConfig {
  const nodeEnv = resolveNodeEnv(source);

  return {
    nodeEnv,
    server: {
      port: envInt(source, 'PORT', 4000),
      host: env(source, 'HOST', '0.0.0.0'),
    },
    database: {
      path: env(source, 'RECEIPT_GATE_DB_PATH', 'data/receipt-gate.db'),
    },
    cors: {
      origins: env(source, 'CORS_ORIGINS', 'http://localhost:5173')
        .split(',')
        .map(s => s.trim())
        .filter(Boolean),
    },
    verification: {
      codeTtlSeconds: envInt(source, 'CODE_TTL_SECONDS', 15 * 60),
      codeMaxAttempts: envInt(source, 'CODE_MAX_ATTEMPTS', 5),
      tokenTtlSeconds: envInt(source, 'TOKEN_TTL_SECONDS', 24 * 60 * 60),
      tokenIssuer: env(source, 'TOKEN_ISSUER', 'receipt-gate'),
      tokenSigningSecret: resolveSigningSecret(source, nodeEnv),
    },
    admin: {
      apiKey: env(source, 'ADMIN_API_KEY', ''),
    },
    rateLimit: {
      verifyMax: envInt(source, 'VERIFY_RATE_LIMIT_MAX', 30),
      verifyTimeWindow: env(source, 'VERIFY_RATE_LIMIT_WINDOW', '1 minute'),
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/** Drop the cached config (for testing). */
export function resetConfig(): void {
  cached = null;
}
