// src/observability/logger.ts
// Structured JSON logging (pino).
//
// - LOG_LEVEL selects the level (defaults to 'info')
// - LOG_PRETTY=true switches to pino-pretty for local development
// - createLogger('module') returns a child logger tagged with that module

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/* ---------- Configuration ---------- */

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "receipt-gate",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      // Raw codes, tokens and salts are redacted wherever they appear.
      redact: {
        paths: ["code", "code6", "signed_token", "token", "salt", "*.code", "*.code6", "*.signed_token", "*.token"],
        censor: "[redacted]",
      },
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger, optionally scoped to a module.
 *
 * @example
 * const log = createLogger('verification/gate');
 * log.info({ docId }, 'document unlocked');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
