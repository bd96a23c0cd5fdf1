// src/routes/receipts.ts
// Receipt endpoints:
// - POST /documents/:docId/receipts        create a receipt from extracted facts
// - GET  /documents/:docId/receipt         latest receipt
// - GET  /documents/:docId/receipts        receipt history, newest first
// - GET  /documents/:docId/receipts/diff   fact-level diff of two receipts
// - GET  /receipts/:receiptId/integrity    recompute and compare the stored hash

import type { FastifyPluginAsync } from 'fastify';
import { canonicalBody } from '../receipts/canonicalize.js';
import type { ReceiptService } from '../receipts/service.js';
import type { FactChange, Receipt } from '../receipts/types.js';
import { parseFactsBody, parsePositiveInt } from './parse.js';

/* ---------- Request Types ---------- */

interface DocParams {
  docId: string;
}

interface ListQuery {
  limit?: string;
}

interface DiffQuery {
  from?: string;
  to?: string;
}

/* ---------- Serializers ---------- */

/**
 * sha256_hash covers canonical_bytes: the format_version byte followed by canonical_json
 * in UTF-8. canonical_bytes is that exact input, base64-encoded.
 */
export function serializeReceipt(receipt: Receipt) {
  return {
    receipt_id: receipt.receiptId,
    doc_id: receipt.docId,
    canonical_json: canonicalBody(receipt.canonicalBytes),
    canonical_bytes: Buffer.from(receipt.canonicalBytes).toString('base64'),
    sha256_hash: receipt.hash,
    format_version: receipt.formatVersion,
    created_at: new Date(receipt.createdAt).toISOString(),
  };
}

function serializeChange(change: FactChange) {
  return {
    key: change.key,
    change_type: change.changeType,
    old_value: change.oldValue ?? null,
    new_value: change.newValue ?? null,
  };
}

/* ---------- Plugin ---------- */

export function createReceiptRoutes(receipts: ReceiptService): FastifyPluginAsync {
  return async (app) => {
    app.post<{ Params: DocParams; Body: unknown }>('/documents/:docId/receipts', async (req, reply) => {
      const parsed = parseFactsBody(req.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: 'validation', message: parsed.message });
      }

      const receipt = await receipts.createReceipt(req.params.docId, parsed.value);
      return reply.code(201).send(serializeReceipt(receipt));
    });

    app.get<{ Params: DocParams }>('/documents/:docId/receipt', async (req, reply) => {
      const receipt = await receipts.getLatestReceipt(req.params.docId);
      if (!receipt) {
        return reply.code(404).send({ error: 'not_found', message: 'No receipt for this document' });
      }
      return serializeReceipt(receipt);
    });

    app.get<{ Params: DocParams; Querystring: ListQuery }>('/documents/:docId/receipts', async (req) => {
      const limit = parsePositiveInt(req.query.limit) ?? undefined;
      const list = await receipts.listReceipts(req.params.docId, limit);
      return { receipts: list.map(serializeReceipt) };
    });

    app.get<{ Params: DocParams; Querystring: DiffQuery }>('/documents/:docId/receipts/diff', async (req, reply) => {
      const { from, to } = req.query;
      if (!from || !to) {
        return reply.code(400).send({ error: 'validation', message: 'from and to receipt ids are required' });
      }

      const changes = await receipts.diffReceipts(req.params.docId, from, to);
      return { from, to, changes: changes.map(serializeChange) };
    });

    app.get<{ Params: { receiptId: string } }>('/receipts/:receiptId/integrity', async (req, reply) => {
      const receipt = await receipts.getReceipt(req.params.receiptId);
      if (!receipt) {
        return reply.code(404).send({ error: 'not_found', message: 'Receipt not found' });
      }

      const report = receipts.verifyIntegrity(receipt);
      return {
        receipt_id: report.receiptId,
        valid: report.valid,
        expected_hash: report.expectedHash,
        actual_hash: report.actualHash,
      };
    });
  };
}
