// src/store/audit.ts
// Append-only audit log of verification attempts and lock transitions.
//
// Tables: verification_audit (UPDATE/DELETE blocked by triggers)

import type { DbAdapter } from "../db/types.js";
import { AuditUnavailableError } from "../verification/errors.js";
import type {
  AuditMethod,
  AuditOutcome,
  FailureReason,
  LockTransitionKind,
} from "../verification/types.js";
import { createLogger } from "../observability/logger.js";

const log = createLogger("store/audit");

/* ---------- Types ---------- */

export interface AuditEntry {
  id: number;
  docId: string;
  actor: string;
  method: AuditMethod;
  outcome: AuditOutcome;
  reason: FailureReason | null;
  transition: LockTransitionKind | null;
  at: number; // unix ms
}

export type NewAuditEntry = Omit<AuditEntry, "id">;

// Row type (snake_case, matches DB)
interface AuditRow {
  id: number;
  doc_id: string;
  actor: string;
  method: AuditMethod;
  outcome: AuditOutcome;
  reason: FailureReason | null;
  transition: LockTransitionKind | null;
  at: number;
}

function rowToEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    docId: row.doc_id,
    actor: row.actor,
    method: row.method,
    outcome: row.outcome,
    reason: row.reason,
    transition: row.transition,
    at: row.at,
  };
}

export interface AuditLog {
  /**
   * Append one entry. Pass the caller's transaction handle so the entry commits
   * or rolls back together with the state change it records.
   * Throws AuditUnavailableError if the entry cannot be written.
   */
  append(entry: NewAuditEntry, tx?: DbAdapter): Promise<AuditEntry>;
  /**
   * Entries for a document, oldest first. The sequence is bounded by the entries
   * present when iteration starts; re-query for a fresh one.
   */
  history(docId: string): AsyncGenerator<AuditEntry, void, undefined>;
  count(docId: string): Promise<number>;
}

const HISTORY_PAGE_SIZE = 100;

/* ---------- Store Factory ---------- */

export function createAuditLog(db: DbAdapter): AuditLog {
  return {
    async append(entry, tx) {
      const target = tx ?? db;
      try {
        const result = await target.run(
          `INSERT INTO verification_audit (doc_id, actor, method, outcome, reason, transition, at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
          [
            entry.docId,
            entry.actor,
            entry.method,
            entry.outcome,
            entry.reason,
            entry.transition,
            entry.at,
          ]
        );
        return { id: Number(result.lastInsertRowid), ...entry };
      } catch (err) {
        log.error({ err, docId: entry.docId }, "Failed to append audit entry");
        throw new AuditUnavailableError({ cause: err });
      }
    },

    async *history(docId) {
      const bound = await db.queryOne<{ max_id: number | null }>(
        `SELECT MAX(id) AS max_id FROM verification_audit WHERE doc_id = ?`,
        [docId]
      );
      const maxId = bound?.max_id ?? 0;
      let afterId = 0;

      while (afterId < maxId) {
        const rows = await db.queryAll<AuditRow>(
          `SELECT * FROM verification_audit
           WHERE doc_id = ? AND id > ? AND id <= ?
           ORDER BY id ASC LIMIT ?`,
          [docId, afterId, maxId, HISTORY_PAGE_SIZE]
        );
        if (rows.length === 0) return;

        for (const row of rows) {
          yield rowToEntry(row);
        }
        afterId = rows[rows.length - 1].id;
      }
    },

    async count(docId) {
      const row = await db.queryOne<{ count: number }>(
        `SELECT COUNT(*) AS count FROM verification_audit WHERE doc_id = ?`,
        [docId]
      );
      return row?.count ?? 0;
    },
  };
}

/** Drain a history sequence into an array. */
export async function collectHistory(auditLog: AuditLog, docId: string): Promise<AuditEntry[]> {
  const entries: AuditEntry[] = [];
  for await (const entry of auditLog.history(docId)) {
    entries.push(entry);
  }
  return entries;
}
