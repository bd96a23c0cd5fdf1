// src/receipts/hash.ts
// Receipt identity: SHA-256 over canonical bytes, lowercase hex.

import crypto from "node:crypto";
import { canonicalize } from "./canonicalize.js";
import type { FactSet } from "./types.js";

export const HASH_ALGORITHM = "sha256";
export const HASH_HEX_LENGTH = 64;

export function hashBytes(bytes: Uint8Array): string {
  return crypto.createHash(HASH_ALGORITHM).update(bytes).digest("hex");
}

export function hashFactSet(facts: FactSet): string {
  return hashBytes(canonicalize(facts));
}

export function isHexDigest(value: string): boolean {
  return value.length === HASH_HEX_LENGTH && /^[0-9a-f]+$/.test(value);
}
