// src/verification/codeIssuer.ts
// Six-digit verification codes. Only a salted SHA-256 of each code is stored;
// the plaintext is returned once, at issuance, for out-of-band delivery.

import crypto from "node:crypto";
import { customAlphabet, nanoid } from "nanoid";
import type { DbAdapter } from "../db/types.js";
import { createLockStateStore } from "../store/lockStates.js";
import {
  createVerificationCodeStore,
  type VerificationCodeRecord,
} from "../store/verificationCodes.js";
import { createLogger } from "../observability/logger.js";
import { recordCodeIssued } from "../observability/metrics.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { DocumentNotFoundError } from "./errors.js";
import type { MethodOutcome } from "./types.js";

const log = createLogger("verification/codes");

export const CODE_LENGTH = 6;
const CODE_PATTERN = /^\d{6}$/;
const SALT_BYTES = 16;

const generateDigits = customAlphabet("0123456789", CODE_LENGTH);

export function isWellFormedCode(code: string): boolean {
  return CODE_PATTERN.test(code);
}

/** sha256(salt || code), lowercase hex. */
export function hashCode(salt: string, code: string): string {
  return crypto.createHash("sha256").update(salt).update(code).digest("hex");
}

function codeMatches(record: VerificationCodeRecord, submitted: string): boolean {
  const expected = Buffer.from(record.codeHash, "hex");
  const actual = Buffer.from(hashCode(record.salt, submitted), "hex");
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}

export interface IssuedCode {
  code: string;
  expiresAt: number;
}

export interface CodeIssuerOptions {
  ttlSeconds: number;
  maxAttempts: number;
  now?: Clock;
  generateCode?: () => string;
}

export class CodeIssuer {
  private readonly now: Clock;
  private readonly generateCode: () => string;

  constructor(
    private readonly db: DbAdapter,
    private readonly options: CodeIssuerOptions
  ) {
    this.now = options.now ?? systemClock;
    this.generateCode = options.generateCode ?? generateDigits;
  }

  /** Issue a fresh code for a registered document, superseding any active one. */
  async issue(docId: string): Promise<IssuedCode> {
    const code = this.generateCode();
    const salt = crypto.randomBytes(SALT_BYTES).toString("hex");
    const at = this.now();
    const expiresAt = at + this.options.ttlSeconds * 1000;

    await this.db.transaction(async (tx) => {
      const lock = await createLockStateStore(tx).get(docId);
      if (!lock) {
        throw new DocumentNotFoundError(docId);
      }

      const codes = createVerificationCodeStore(tx);
      const superseded = await codes.supersedeActive(docId, at);
      await codes.insert({
        id: nanoid(),
        docId,
        codeHash: hashCode(salt, code),
        salt,
        attempts: 0,
        maxAttempts: this.options.maxAttempts,
        expiresAt,
        status: "active",
        createdAt: at,
        updatedAt: at,
      });

      if (superseded > 0) {
        log.debug({ docId, superseded }, "Superseded previous verification code");
      }
    });

    recordCodeIssued();
    log.info({ docId, expiresAt }, "Verification code issued");
    return { code, expiresAt };
  }

  /**
   * Check a submitted code against the document's latest code, inside the
   * caller's transaction. Updates attempts and status as a side effect.
   */
  async check(tx: DbAdapter, docId: string, submitted: string): Promise<MethodOutcome> {
    const codes = createVerificationCodeStore(tx);
    const record = await codes.findLatest(docId);
    const at = this.now();

    if (!record || record.status === "consumed" || record.status === "superseded") {
      return { outcome: "failure", reason: "no_active_code" };
    }
    if (record.status === "expired") {
      return { outcome: "expired", reason: "expired" };
    }

    // Expiry wins over lockout, including for codes already locked out.
    if (at > record.expiresAt) {
      await codes.update(record.id, { attempts: record.attempts, status: "expired" }, at);
      return { outcome: "expired", reason: "expired" };
    }
    if (record.status === "locked_out") {
      return { outcome: "rate_limited", reason: "rate_limited" };
    }
    if (record.attempts >= record.maxAttempts) {
      await codes.update(record.id, { attempts: record.attempts, status: "locked_out" }, at);
      return { outcome: "rate_limited", reason: "rate_limited" };
    }

    if (codeMatches(record, submitted)) {
      await codes.update(record.id, { attempts: record.attempts, status: "consumed" }, at);
      return { outcome: "success" };
    }

    const attempts = record.attempts + 1;
    if (attempts >= record.maxAttempts) {
      await codes.update(record.id, { attempts, status: "locked_out" }, at);
      log.warn({ docId, attempts }, "Verification code locked out");
      return { outcome: "rate_limited", reason: "rate_limited" };
    }

    await codes.update(record.id, { attempts, status: "active" }, at);
    return { outcome: "failure", reason: "code_mismatch" };
  }
}
