// src/store/lockStates.ts
// Per-document lock state. A row exists for every registered document.
//
// Tables: lock_states

import type { DbAdapter } from "../db/types.js";
import type { LockState, VerificationMethod } from "../verification/types.js";

// Row type (snake_case, matches DB)
interface LockStateRow {
  doc_id: string;
  sensitive_input_locked: number;
  unlocked_at: number | null;
  unlocked_method: string | null;
  unlocked_by: string | null;
  lock_round: number;
  created_at: number;
  updated_at: number;
}

function toMethod(value: string | null): VerificationMethod | null {
  return value === "code" || value === "token" ? value : null;
}

function rowToLockState(row: LockStateRow): LockState {
  return {
    docId: row.doc_id,
    sensitiveInputLocked: row.sensitive_input_locked === 1,
    unlockedAt: row.unlocked_at,
    unlockedMethod: toMethod(row.unlocked_method),
    unlockedBy: row.unlocked_by,
    lockRound: row.lock_round,
  };
}

export interface LockStateStore {
  /** Register a document in the locked state. Returns false if it already exists. */
  register(docId: string, at: number): Promise<boolean>;
  get(docId: string): Promise<LockState | null>;
  /**
   * Replace `current` with `next` only if the stored row still matches `current`
   * (lock flag and round). Returns false when another writer got there first.
   */
  compareAndSet(current: LockState, next: LockState, at: number): Promise<boolean>;
}

export function createLockStateStore(db: DbAdapter): LockStateStore {
  return {
    async register(docId, at) {
      const result = await db.run(
        `INSERT INTO lock_states (doc_id, sensitive_input_locked, lock_round, created_at, updated_at)
         VALUES (?, 1, 1, ?, ?)
         ON CONFLICT(doc_id) DO NOTHING`,
        [docId, at, at]
      );
      return result.changes === 1;
    },

    async get(docId) {
      const row = await db.queryOne<LockStateRow>(
        `SELECT * FROM lock_states WHERE doc_id = ?`,
        [docId]
      );
      return row ? rowToLockState(row) : null;
    },

    async compareAndSet(current, next, at) {
      const result = await db.run(
        `UPDATE lock_states
         SET sensitive_input_locked = ?, unlocked_at = ?, unlocked_method = ?, unlocked_by = ?,
             lock_round = ?, updated_at = ?
         WHERE doc_id = ? AND sensitive_input_locked = ? AND lock_round = ?`,
        [
          next.sensitiveInputLocked ? 1 : 0,
          next.unlockedAt,
          next.unlockedMethod,
          next.unlockedBy,
          next.lockRound,
          at,
          current.docId,
          current.sensitiveInputLocked ? 1 : 0,
          current.lockRound,
        ]
      );
      return result.changes === 1;
    },
  };
}
