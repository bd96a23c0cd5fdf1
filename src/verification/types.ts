// src/verification/types.ts
// Shared types for code/token verification and the per-document lock.

export type VerificationMethod = "code" | "token";

/** Methods recorded in the audit log; "admin" covers explicit re-locks. */
export type AuditMethod = VerificationMethod | "admin";

export type AuditOutcome = "success" | "failure" | "expired" | "rate_limited";

/** Internal reason codes. Logged and audited, never returned to the verifying client. */
export type FailureReason =
  | "code_mismatch"
  | "no_active_code"
  | "expired"
  | "rate_limited"
  | "signature_invalid"
  | "document_mismatch";

export type LockTransitionKind = "unlocked" | "relocked";

/** Incoming verification, dispatched on `method`. */
export type VerificationRequest =
  | { method: "code"; docId: string; code: string }
  | { method: "token"; docId: string; token: string };

/** Result of checking one verification artifact, before any lock transition. */
export type MethodOutcome =
  | { outcome: "success" }
  | { outcome: Exclude<AuditOutcome, "success">; reason: FailureReason };

export interface VerificationResult {
  verified: true;
  /** Lock state after this verification (always true on success). */
  unlocked: boolean;
  /** True only for the verification that moved the document from locked to unlocked. */
  transitioned: boolean;
}

export interface LockState {
  docId: string;
  sensitiveInputLocked: boolean;
  unlockedAt: number | null;
  unlockedMethod: VerificationMethod | null;
  unlockedBy: string | null;
  /** Incremented by every re-lock; a round ends with the first successful verification. */
  lockRound: number;
}
