import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createTestContext, T0, type TestContext } from '../../__tests__/harness.js';
import { createLockStateStore } from '../../store/lockStates.js';
import { DuplicateKeyError, ReceiptNotFoundError } from '../errors.js';
import { hashFactSet } from '../hash.js';
import { ReceiptService } from '../service.js';
import type { Fact } from '../types.js';

let ctx: TestContext;
let service: ReceiptService;

beforeEach(() => {
  ctx = createTestContext();
  let seq = 0;
  service = new ReceiptService(ctx.db, { now: ctx.clock.now, newId: () => `rcpt-${++seq}` });
});

afterEach(async () => {
  await ctx.db.close();
});

const FACTS_V1: Fact[] = [
  { key: 'sender', value: 'acme@example.com', evidenceSpan: [0, 16] },
  { key: 'amount', value: 120 },
];

const FACTS_V2: Fact[] = [
  { key: 'amount', value: 150 },
  { key: 'sender', value: 'acme@example.com', evidenceSpan: [4, 20] },
  { key: 'due', value: '2025-02-01' },
];

/* ============= Creation ============= */

describe('createReceipt', () => {
  it('stores canonical bytes and their hash', async () => {
    const receipt = await service.createReceipt('doc-1', FACTS_V1);

    expect(receipt).toMatchObject({
      receiptId: 'rcpt-1',
      docId: 'doc-1',
      formatVersion: 1,
      hash: hashFactSet(FACTS_V1),
      createdAt: T0,
    });
    expect(receipt.canonicalBytes[0]).toBe(1);

    const stored = await service.getReceipt('rcpt-1');
    expect(stored?.hash).toBe(receipt.hash);
    expect(stored?.canonicalBytes.equals(receipt.canonicalBytes)).toBe(true);
  });

  it('registers the document in the locked state', async () => {
    await service.createReceipt('doc-1', FACTS_V1);

    const state = await createLockStateStore(ctx.db).get('doc-1');
    expect(state).toEqual({
      docId: 'doc-1',
      sensitiveInputLocked: true,
      unlockedAt: null,
      unlockedMethod: null,
      unlockedBy: null,
      lockRound: 1,
    });
  });

  it('writes nothing when the fact set is invalid', async () => {
    const duplicate: Fact[] = [
      { key: 'a', value: 1 },
      { key: 'a', value: 1 },
    ];

    await expect(service.createReceipt('doc-1', duplicate)).rejects.toBeInstanceOf(DuplicateKeyError);
    expect(await service.getLatestReceipt('doc-1')).toBeNull();
    expect(await createLockStateStore(ctx.db).get('doc-1')).toBeNull();
  });

  it('creates a new receipt per fact set instead of editing the old one', async () => {
    const first = await service.createReceipt('doc-1', FACTS_V1);
    ctx.clock.advance(1000);
    const second = await service.createReceipt('doc-1', FACTS_V2);

    expect(second.receiptId).not.toBe(first.receiptId);
    expect((await service.getReceipt(first.receiptId))?.hash).toBe(first.hash);
  });
});

/* ============= Reads ============= */

describe('getLatestReceipt / listReceipts', () => {
  it('returns the newest receipt and lists newest first', async () => {
    await service.createReceipt('doc-1', FACTS_V1);
    ctx.clock.advance(1000);
    await service.createReceipt('doc-1', FACTS_V2);
    await service.createReceipt('doc-2', FACTS_V1);

    expect((await service.getLatestReceipt('doc-1'))?.receiptId).toBe('rcpt-2');
    expect((await service.listReceipts('doc-1')).map((r) => r.receiptId)).toEqual(['rcpt-2', 'rcpt-1']);
  });

  it('breaks timestamp ties by insertion order', async () => {
    await service.createReceipt('doc-1', FACTS_V1);
    await service.createReceipt('doc-1', FACTS_V2);

    expect((await service.getLatestReceipt('doc-1'))?.receiptId).toBe('rcpt-2');
  });

  it('decodes stored facts back into sorted order', async () => {
    const receipt = await service.createReceipt('doc-1', FACTS_V1);

    expect(service.factsOf(receipt)).toEqual([
      { key: 'amount', value: 120 },
      { key: 'sender', value: 'acme@example.com', evidenceSpan: [0, 16] },
    ]);
  });
});

/* ============= Integrity ============= */

describe('verifyIntegrity', () => {
  it('accepts an untouched receipt', async () => {
    const receipt = await service.createReceipt('doc-1', FACTS_V1);

    expect(service.verifyIntegrity(receipt)).toEqual({
      receiptId: 'rcpt-1',
      valid: true,
      expectedHash: receipt.hash,
      actualHash: receipt.hash,
    });
  });

  it('detects stored bytes that no longer match the hash', async () => {
    const receipt = await service.createReceipt('doc-1', FACTS_V1);
    const forged = Buffer.concat([Buffer.from([1]), Buffer.from('[["amount","n",999]]', 'utf8')]);
    await ctx.db.run('UPDATE receipts SET canonical_bytes = ? WHERE receipt_id = ?', [forged, receipt.receiptId]);

    const stored = await service.getReceipt(receipt.receiptId);
    if (!stored) throw new Error('receipt missing');
    const report = service.verifyIntegrity(stored);

    expect(report.valid).toBe(false);
    expect(report.expectedHash).toBe(receipt.hash);
    expect(report.actualHash).toBe(hashFactSet([{ key: 'amount', value: 999 }]));
  });
});

/* ============= Diff ============= */

describe('diffReceipts', () => {
  it('compares two receipts of the same document', async () => {
    const first = await service.createReceipt('doc-1', FACTS_V1);
    const second = await service.createReceipt('doc-1', FACTS_V2);

    expect(await service.diffReceipts('doc-1', first.receiptId, second.receiptId)).toEqual([
      { key: 'amount', changeType: 'modified', oldValue: 120, newValue: 150 },
      { key: 'due', changeType: 'added', oldValue: undefined, newValue: '2025-02-01' },
    ]);
  });

  it('refuses receipts belonging to another document', async () => {
    const mine = await service.createReceipt('doc-1', FACTS_V1);
    const theirs = await service.createReceipt('doc-2', FACTS_V2);

    await expect(service.diffReceipts('doc-1', mine.receiptId, theirs.receiptId))
      .rejects.toBeInstanceOf(ReceiptNotFoundError);
    await expect(service.diffReceipts('doc-1', 'missing', mine.receiptId))
      .rejects.toBeInstanceOf(ReceiptNotFoundError);
  });
});
