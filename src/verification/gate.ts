// src/verification/gate.ts
// Verification gate: checks a code or signed token for a document, records the
// attempt, and unlocks sensitive input on the first success of a lock round.
//
// Per document, verify/relock/issueCode run one at a time (KeyedMutex), and each
// verify is one transaction: method check + audit entry + lock transition.
// If the audit entry cannot be written nothing else is committed.

import type { DbAdapter } from "../db/types.js";
import { createLockStateStore } from "../store/lockStates.js";
import type { AuditLog } from "../store/audit.js";
import { createLogger } from "../observability/logger.js";
import {
  recordLockTransition,
  recordTokenIssued,
  recordVerification,
} from "../observability/metrics.js";
import { systemClock, type Clock } from "../utils/clock.js";
import type { CodeIssuer, IssuedCode } from "./codeIssuer.js";
import type { IssuedToken, TokenIssuer } from "./tokenIssuer.js";
import { DocumentNotFoundError, VerificationError, errorForOutcome } from "./errors.js";
import { KeyedMutex } from "./keyedMutex.js";
import { fireLockEvent, type LockTransitionResult } from "./lockStateMachine.js";
import type {
  LockState,
  MethodOutcome,
  VerificationMethod,
  VerificationRequest,
  VerificationResult,
} from "./types.js";

const log = createLogger("verification/gate");

export interface UnlockedEvent {
  docId: string;
  method: VerificationMethod;
  actor: string;
  at: number;
  lockRound: number;
}

export type UnlockListener = (event: UnlockedEvent) => void | Promise<void>;

export interface VerificationGateDeps {
  db: DbAdapter;
  codes: CodeIssuer;
  tokens: TokenIssuer;
  audit: AuditLog;
  now?: Clock;
}

export class VerificationGate {
  private readonly mutex = new KeyedMutex();
  private readonly listeners = new Set<UnlockListener>();
  private readonly now: Clock;

  constructor(private readonly deps: VerificationGateDeps) {
    this.now = deps.now ?? systemClock;
  }

  /** Subscribe to locked -> unlocked transitions. Returns an unsubscribe function. */
  onUnlocked(listener: UnlockListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async getLockState(docId: string): Promise<LockState | null> {
    return createLockStateStore(this.deps.db).get(docId);
  }

  issueCode(docId: string): Promise<IssuedCode> {
    return this.mutex.runExclusive(docId, () => this.deps.codes.issue(docId));
  }

  async issueToken(docId: string, issuer?: string, ttlSeconds?: number): Promise<IssuedToken> {
    const state = await this.getLockState(docId);
    if (!state) {
      throw new DocumentNotFoundError(docId);
    }
    const issued = this.deps.tokens.issue(docId, issuer, ttlSeconds);
    recordTokenIssued();
    log.info({ docId, issuer: issued.issuer, expiresAt: issued.expiresAt }, "Verification token issued");
    return issued;
  }

  /**
   * Verify a code or token for a document.
   * Resolves on success; rejects with a VerificationError subclass on any rejection,
   * or AuditUnavailableError if the attempt could not be recorded.
   */
  verify(request: VerificationRequest, actor: string): Promise<VerificationResult> {
    return this.mutex.runExclusive(request.docId, async () => {
      const at = this.now();
      const { docId, method } = request;

      const { outcome, transition } = await this.deps.db.transaction(async (tx) => {
        const outcome = await this.checkMethod(tx, request);

        let transition: LockTransitionResult | null = null;
        if (outcome.outcome === "success") {
          transition = await fireLockEvent(tx, docId, { type: "verify_success", method, actor, at });
        }

        await this.deps.audit.append(
          {
            docId,
            actor,
            method,
            outcome: outcome.outcome,
            reason: outcome.outcome === "success" ? null : outcome.reason,
            transition: transition?.fired ?? null,
            at,
          },
          tx
        );
        return { outcome, transition };
      });

      recordVerification(method, outcome.outcome);

      if (outcome.outcome !== "success") {
        log.info({ docId, method, actor, outcome: outcome.outcome, reason: outcome.reason }, "Verification rejected");
        throw errorForOutcome(method, outcome.outcome, outcome.reason);
      }

      const transitioned = transition?.fired === "unlocked";
      if (transition && transitioned) {
        recordLockTransition("unlocked");
        log.info({ docId, method, actor, lockRound: transition.state.lockRound }, "Sensitive input unlocked");
        await this.notifyUnlocked({ docId, method, actor, at, lockRound: transition.state.lockRound });
      }

      return {
        verified: true,
        unlocked: transition ? !transition.state.sensitiveInputLocked : true,
        transitioned,
      };
    });
  }

  /** Return an unlocked document to the locked state and start a new lock round. */
  relock(docId: string, actor: string): Promise<LockState> {
    return this.mutex.runExclusive(docId, async () => {
      const at = this.now();

      const result = await this.deps.db.transaction(async (tx) => {
        const result = await fireLockEvent(tx, docId, { type: "relock", actor, at });
        await this.deps.audit.append(
          {
            docId,
            actor,
            method: "admin",
            outcome: "success",
            reason: null,
            transition: result.fired,
            at,
          },
          tx
        );
        return result;
      });

      if (result.fired) {
        recordLockTransition("relocked");
        log.info({ docId, actor, lockRound: result.state.lockRound }, "Sensitive input re-locked");
      }
      return result.state;
    });
  }

  private async checkMethod(tx: DbAdapter, request: VerificationRequest): Promise<MethodOutcome> {
    if (request.method === "code") {
      return this.deps.codes.check(tx, request.docId, request.code);
    }

    try {
      const claims = this.deps.tokens.verify(request.token);
      if (claims.docId !== request.docId) {
        return { outcome: "failure", reason: "document_mismatch" };
      }
      return { outcome: "success" };
    } catch (err) {
      if (err instanceof VerificationError) {
        return { outcome: err.outcome, reason: err.reason };
      }
      throw err;
    }
  }

  private async notifyUnlocked(event: UnlockedEvent): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (err) {
        log.error({ err, docId: event.docId }, "Unlock listener failed");
      }
    }
  }
}
