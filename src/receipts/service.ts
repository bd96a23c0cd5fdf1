// src/receipts/service.ts
// Receipt lifecycle: canonicalize + hash a fact set, persist it immutably,
// and read receipts back for display, integrity checks and diffs.

import crypto from "node:crypto";
import type { DbAdapter } from "../db/types.js";
import { createLockStateStore } from "../store/lockStates.js";
import { createReceiptStore } from "../store/receipts.js";
import { createLogger } from "../observability/logger.js";
import { recordReceiptCreated } from "../observability/metrics.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { CANONICAL_FORMAT_VERSION, canonicalize, decodeCanonical } from "./canonicalize.js";
import { diffFactSets } from "./diff.js";
import { ReceiptNotFoundError } from "./errors.js";
import { hashBytes } from "./hash.js";
import type { Fact, FactChange, FactSet, IntegrityReport, Receipt } from "./types.js";

const log = createLogger("receipts");

export interface ReceiptServiceOptions {
  now?: Clock;
  newId?: () => string;
}

export class ReceiptService {
  private readonly now: Clock;
  private readonly newId: () => string;

  constructor(
    private readonly db: DbAdapter,
    options: ReceiptServiceOptions = {}
  ) {
    this.now = options.now ?? systemClock;
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  /**
   * Create a receipt for a document's latest extraction. The first receipt
   * registers the document, which starts out locked.
   * Throws DuplicateKeyError / InvalidFactError before anything is written.
   */
  async createReceipt(docId: string, facts: FactSet): Promise<Receipt> {
    const canonicalBytes = canonicalize(facts);
    const receipt: Receipt = {
      receiptId: this.newId(),
      docId,
      canonicalBytes,
      formatVersion: CANONICAL_FORMAT_VERSION,
      hash: hashBytes(canonicalBytes),
      createdAt: this.now(),
    };

    const registered = await this.db.transaction(async (tx) => {
      const isNew = await createLockStateStore(tx).register(docId, receipt.createdAt);
      await createReceiptStore(tx).insert(receipt);
      return isNew;
    });

    recordReceiptCreated();
    log.info(
      { docId, receiptId: receipt.receiptId, hash: receipt.hash, facts: facts.length, registered },
      "Receipt created"
    );
    return receipt;
  }

  async getReceipt(receiptId: string): Promise<Receipt | null> {
    return createReceiptStore(this.db).findById(receiptId);
  }

  /** The receipt shown to the user: the most recent one for the document. */
  async getLatestReceipt(docId: string): Promise<Receipt | null> {
    return createReceiptStore(this.db).findLatestForDoc(docId);
  }

  async listReceipts(docId: string, limit?: number): Promise<Receipt[]> {
    return createReceiptStore(this.db).listForDoc(docId, limit);
  }

  factsOf(receipt: Receipt): Fact[] {
    return decodeCanonical(receipt.canonicalBytes);
  }

  /** Recompute the hash of the stored bytes and compare it with the recorded one. */
  verifyIntegrity(receipt: Receipt): IntegrityReport {
    const actualHash = hashBytes(receipt.canonicalBytes);
    return {
      receiptId: receipt.receiptId,
      valid: actualHash === receipt.hash,
      expectedHash: receipt.hash,
      actualHash,
    };
  }

  /** Fact-level changes between two receipts of the same document. */
  async diffReceipts(docId: string, fromId: string, toId: string): Promise<FactChange[]> {
    const store = createReceiptStore(this.db);
    const [from, to] = await Promise.all([store.findById(fromId), store.findById(toId)]);

    if (!from || from.docId !== docId) throw new ReceiptNotFoundError(fromId);
    if (!to || to.docId !== docId) throw new ReceiptNotFoundError(toId);

    return diffFactSets(this.factsOf(from), this.factsOf(to));
  }
}
