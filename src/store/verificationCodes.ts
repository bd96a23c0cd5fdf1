// src/store/verificationCodes.ts
// Short numeric verification codes, stored as salted hashes.
//
// Tables: verification_codes

import type { DbAdapter } from "../db/types.js";

/* ---------- Types ---------- */

export type CodeStatus = "active" | "consumed" | "expired" | "locked_out" | "superseded";

const CODE_STATUSES: readonly CodeStatus[] = [
  "active", "consumed", "expired", "locked_out", "superseded",
];

export function isCodeStatus(value: string): value is CodeStatus {
  return (CODE_STATUSES as readonly string[]).includes(value);
}

// Domain type (camelCase)
export interface VerificationCodeRecord {
  id: string;
  docId: string;
  codeHash: string;
  salt: string;
  attempts: number;
  maxAttempts: number;
  expiresAt: number; // unix ms
  status: CodeStatus;
  createdAt: number;
  updatedAt: number;
}

// Row type (snake_case, matches DB)
interface VerificationCodeRow {
  id: string;
  doc_id: string;
  code_hash: string;
  salt: string;
  attempts: number;
  max_attempts: number;
  expires_at: number;
  status: string;
  created_at: number;
  updated_at: number;
}

function rowToRecord(row: VerificationCodeRow): VerificationCodeRecord {
  if (!isCodeStatus(row.status)) {
    throw new Error(`Unknown verification code status: ${row.status}`);
  }
  return {
    id: row.id,
    docId: row.doc_id,
    codeHash: row.code_hash,
    salt: row.salt,
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    expiresAt: row.expires_at,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface VerificationCodeStore {
  insert(record: VerificationCodeRecord): Promise<void>;
  /** Mark any active code for the document as superseded. Returns the number affected. */
  supersedeActive(docId: string, at: number): Promise<number>;
  /** Most recently issued code for the document, whatever its status. */
  findLatest(docId: string): Promise<VerificationCodeRecord | null>;
  update(id: string, changes: { attempts: number; status: CodeStatus }, at: number): Promise<void>;
}

/* ---------- Store Factory ---------- */

export function createVerificationCodeStore(db: DbAdapter): VerificationCodeStore {
  return {
    async insert(record) {
      await db.run(
        `INSERT INTO verification_codes (
           id, doc_id, code_hash, salt, attempts, max_attempts, expires_at, status, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          record.id,
          record.docId,
          record.codeHash,
          record.salt,
          record.attempts,
          record.maxAttempts,
          record.expiresAt,
          record.status,
          record.createdAt,
          record.updatedAt,
        ]
      );
    },

    async supersedeActive(docId, at) {
      const result = await db.run(
        `UPDATE verification_codes SET status = 'superseded', updated_at = ?
         WHERE doc_id = ? AND status = 'active'`,
        [at, docId]
      );
      return result.changes;
    },

    async findLatest(docId) {
      const row = await db.queryOne<VerificationCodeRow>(
        `SELECT * FROM verification_codes WHERE doc_id = ?
         ORDER BY created_at DESC, rowid DESC LIMIT 1`,
        [docId]
      );
      return row ? rowToRecord(row) : null;
    },

    async update(id, changes, at) {
      await db.run(
        `UPDATE verification_codes SET attempts = ?, status = ?, updated_at = ? WHERE id = ?`,
        [changes.attempts, changes.status, at, id]
      );
    },
  };
}
