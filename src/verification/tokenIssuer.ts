// src/verification/tokenIssuer.ts
// Signed verification tokens (HS256 JWT) bound to a single document.
//
// Claims: { doc_id, iss, iat, exp }   (iat/exp in seconds)

import jwt, { type JwtPayload } from "jsonwebtoken";
import { systemClock, type Clock } from "../utils/clock.js";
import { ExpiredError, SignatureInvalidError, SigningKeyUnavailableError } from "./errors.js";

export interface TokenClaims {
  doc_id: string;
  iss: string;
  iat: number;
  exp: number;
}

export interface IssuedToken {
  token: string;
  docId: string;
  issuer: string;
  issuedAt: number; // unix ms
  expiresAt: number; // unix ms
}

export interface VerifiedToken {
  docId: string;
  issuer: string;
  issuedAt: number;
  expiresAt: number;
}

export interface TokenIssuerOptions {
  secret: string;
  issuer: string;
  defaultTtlSeconds: number;
  now?: Clock;
}

const ALGORITHM = "HS256";

function parseClaims(decoded: string | JwtPayload): TokenClaims {
  if (typeof decoded === "string") {
    throw new SignatureInvalidError("payload is not a claims object");
  }
  const { doc_id, iss, iat, exp } = decoded;
  if (
    typeof doc_id !== "string" ||
    typeof iss !== "string" ||
    typeof iat !== "number" ||
    typeof exp !== "number"
  ) {
    throw new SignatureInvalidError("missing or malformed claims");
  }
  return { doc_id, iss, iat, exp };
}

export class TokenIssuer {
  private readonly now: Clock;

  constructor(private readonly options: TokenIssuerOptions) {
    this.now = options.now ?? systemClock;
  }

  issue(docId: string, issuer?: string, ttlSeconds?: number): IssuedToken {
    if (!this.options.secret) {
      throw new SigningKeyUnavailableError();
    }

    const iat = Math.floor(this.now() / 1000);
    const claims: TokenClaims = {
      doc_id: docId,
      iss: issuer ?? this.options.issuer,
      iat,
      exp: iat + (ttlSeconds ?? this.options.defaultTtlSeconds),
    };
    const token = jwt.sign(claims, this.options.secret, { algorithm: ALGORITHM });

    return {
      token,
      docId,
      issuer: claims.iss,
      issuedAt: claims.iat * 1000,
      expiresAt: claims.exp * 1000,
    };
  }

  /**
   * Verify signature and expiry. Throws SignatureInvalidError or ExpiredError.
   * Document binding is checked by the caller.
   */
  verify(token: string): VerifiedToken {
    if (!this.options.secret) {
      throw new SigningKeyUnavailableError();
    }

    let decoded: string | JwtPayload;
    try {
      // Expiry is checked below against the injected clock.
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        ignoreExpiration: true,
      });
    } catch (err) {
      throw new SignatureInvalidError(err instanceof Error ? err.message : undefined);
    }

    const claims = parseClaims(decoded);
    if (this.now() > claims.exp * 1000) {
      throw new ExpiredError("token");
    }

    return {
      docId: claims.doc_id,
      issuer: claims.iss,
      issuedAt: claims.iat * 1000,
      expiresAt: claims.exp * 1000,
    };
  }
}
