// src/verification/errors.ts
// Verification error kinds. Every VerificationError is shown to clients as the
// same "verification failed" response; `reason` is for logs and the audit trail.

import type { AuditOutcome, FailureReason } from "./types.js";

export class VerificationError extends Error {
  constructor(
    readonly outcome: Exclude<AuditOutcome, "success">,
    readonly reason: FailureReason,
    message: string
  ) {
    super(message);
    this.name = "VerificationError";
  }
}

/** Code or token past its expiry; a new one must be requested. */
export class ExpiredError extends VerificationError {
  constructor(what: "code" | "token") {
    super("expired", "expired", `Verification ${what} has expired`);
    this.name = "ExpiredError";
  }
}

/** Attempt budget for the active code is exhausted. */
export class RateLimitedError extends VerificationError {
  constructor() {
    super("rate_limited", "rate_limited", "Too many failed verification attempts");
    this.name = "RateLimitedError";
  }
}

/** Token signature does not verify, or the token is not a well-formed signed token. */
export class SignatureInvalidError extends VerificationError {
  constructor(detail?: string) {
    super("failure", "signature_invalid", `Token signature is invalid${detail ? `: ${detail}` : ""}`);
    this.name = "SignatureInvalidError";
  }
}

/** Token is valid but bound to another document. */
export class DocumentMismatchError extends VerificationError {
  constructor() {
    super("failure", "document_mismatch", "Token is not bound to this document");
    this.name = "DocumentMismatchError";
  }
}

/** Wrong code, or no code is active for the document. */
export class CodeRejectedError extends VerificationError {
  constructor(reason: "code_mismatch" | "no_active_code") {
    super("failure", reason, "Verification code rejected");
    this.name = "CodeRejectedError";
  }
}

/** Map a non-success outcome to its error. */
export function errorForOutcome(
  method: "code" | "token",
  outcome: Exclude<AuditOutcome, "success">,
  reason: FailureReason
): VerificationError {
  switch (reason) {
    case "expired":
      return new ExpiredError(method);
    case "rate_limited":
      return new RateLimitedError();
    case "signature_invalid":
      return new SignatureInvalidError();
    case "document_mismatch":
      return new DocumentMismatchError();
    case "code_mismatch":
    case "no_active_code":
      return new CodeRejectedError(reason);
    default:
      return new VerificationError(outcome, reason, "Verification failed");
  }
}

/** The audit sink could not record the attempt; the verification was rolled back. */
export class AuditUnavailableError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Audit log unavailable; verification aborted", options);
    this.name = "AuditUnavailableError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly docId: string) {
    super(`Document not registered: ${docId}`);
    this.name = "DocumentNotFoundError";
  }
}

/** The token signing key is not configured; issuance cannot proceed. */
export class SigningKeyUnavailableError extends Error {
  constructor() {
    super("Token signing key is not configured");
    this.name = "SigningKeyUnavailableError";
  }
}
