// src/store/receipts.ts
// Immutable receipts. Rows are inserted, never updated.
//
// Tables: receipts

import type { DbAdapter } from "../db/types.js";
import type { Receipt } from "../receipts/types.js";

// Row type (snake_case, matches DB)
interface ReceiptRow {
  receipt_id: string;
  doc_id: string;
  canonical_bytes: Buffer;
  format_version: number;
  hash: string;
  created_at: number;
}

function rowToReceipt(row: ReceiptRow): Receipt {
  return {
    receiptId: row.receipt_id,
    docId: row.doc_id,
    canonicalBytes: row.canonical_bytes,
    formatVersion: row.format_version,
    hash: row.hash,
    createdAt: row.created_at,
  };
}

export interface ReceiptStore {
  insert(receipt: Receipt): Promise<void>;
  findById(receiptId: string): Promise<Receipt | null>;
  findLatestForDoc(docId: string): Promise<Receipt | null>;
  /** Newest first. */
  listForDoc(docId: string, limit?: number): Promise<Receipt[]>;
}

const MAX_LIST_LIMIT = 200;

export function createReceiptStore(db: DbAdapter): ReceiptStore {
  return {
    async insert(receipt) {
      await db.run(
        `INSERT INTO receipts (receipt_id, doc_id, canonical_bytes, format_version, hash, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          receipt.receiptId,
          receipt.docId,
          receipt.canonicalBytes,
          receipt.formatVersion,
          receipt.hash,
          receipt.createdAt,
        ]
      );
    },

    async findById(receiptId) {
      const row = await db.queryOne<ReceiptRow>(
        `SELECT * FROM receipts WHERE receipt_id = ?`,
        [receiptId]
      );
      return row ? rowToReceipt(row) : null;
    },

    async findLatestForDoc(docId) {
      const row = await db.queryOne<ReceiptRow>(
        `SELECT * FROM receipts WHERE doc_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1`,
        [docId]
      );
      return row ? rowToReceipt(row) : null;
    },

    async listForDoc(docId, limit = 50) {
      const rows = await db.queryAll<ReceiptRow>(
        `SELECT * FROM receipts WHERE doc_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`,
        [docId, Math.min(Math.max(limit, 1), MAX_LIST_LIMIT)]
      );
      return rows.map(rowToReceipt);
    },
  };
}
