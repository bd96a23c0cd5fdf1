import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createTestContext, registerDocument, T0, type TestContext } from '../../__tests__/harness.js';
import { createVerificationCodeStore } from '../../store/verificationCodes.js';
import { CodeIssuer, hashCode, isWellFormedCode } from '../codeIssuer.js';
import { DocumentNotFoundError } from '../errors.js';

const TTL_MS = 900 * 1000;

let ctx: TestContext;
let codes: string[];
let issuer: CodeIssuer;

beforeEach(async () => {
  ctx = createTestContext();
  codes = ['482913', '000731', '555555'];
  issuer = new CodeIssuer(ctx.db, {
    ttlSeconds: 900,
    maxAttempts: 5,
    now: ctx.clock.now,
    generateCode: () => codes.shift() ?? '999999',
  });
  await registerDocument(ctx, 'D1');
});

afterEach(async () => {
  await ctx.db.close();
});

function check(docId: string, code: string) {
  return ctx.db.transaction((tx) => issuer.check(tx, docId, code));
}

function latest(docId = 'D1') {
  return createVerificationCodeStore(ctx.db).findLatest(docId);
}

/* ============= Issuance ============= */

describe('issue', () => {
  it('returns the raw code once and stores only its salted hash', async () => {
    const issued = await issuer.issue('D1');
    expect(issued).toEqual({ code: '482913', expiresAt: T0 + TTL_MS });

    const row = await ctx.db.queryOne<Record<string, unknown>>('SELECT * FROM verification_codes');
    expect(Object.keys(row ?? {}).sort()).toEqual([
      'attempts', 'code_hash', 'created_at', 'doc_id', 'expires_at',
      'id', 'max_attempts', 'salt', 'status', 'updated_at',
    ]);

    const record = await latest();
    expect(record?.codeHash).toBe(hashCode(record?.salt ?? '', '482913'));
    expect(record?.codeHash).not.toContain('482913');
    expect(record?.salt).toMatch(/^[0-9a-f]{32}$/);
    expect(record).toMatchObject({ attempts: 0, maxAttempts: 5, status: 'active' });
  });

  it('uses a fresh salt per code', async () => {
    await issuer.issue('D1');
    const first = await latest();
    await issuer.issue('D1');
    const second = await latest();

    expect(second?.salt).not.toBe(first?.salt);
  });

  it('supersedes the previous active code', async () => {
    await issuer.issue('D1');
    await issuer.issue('D1');

    const statuses = await ctx.db.queryAll<{ status: string }>(
      'SELECT status FROM verification_codes ORDER BY created_at, rowid'
    );
    expect(statuses.map((r) => r.status)).toEqual(['superseded', 'active']);
    expect(await check('D1', '482913')).toEqual({ outcome: 'failure', reason: 'code_mismatch' });
    expect(await check('D1', '000731')).toEqual({ outcome: 'success' });
  });

  it('refuses unregistered documents', async () => {
    await expect(issuer.issue('unknown')).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('generates six random digits by default', async () => {
    const defaultIssuer = new CodeIssuer(ctx.db, { ttlSeconds: 900, maxAttempts: 5, now: ctx.clock.now });
    const { code } = await defaultIssuer.issue('D1');
    expect(code).toMatch(/^\d{6}$/);
  });
});

/* ============= Checking ============= */

describe('check', () => {
  it('accepts the correct code once', async () => {
    await issuer.issue('D1');

    expect(await check('D1', '482913')).toEqual({ outcome: 'success' });
    expect((await latest())?.status).toBe('consumed');
    expect(await check('D1', '482913')).toEqual({ outcome: 'failure', reason: 'no_active_code' });
  });

  it('keeps leading zeros significant', async () => {
    codes = ['000731'];
    await issuer.issue('D1');

    expect(await check('D1', '731')).toEqual({ outcome: 'failure', reason: 'code_mismatch' });
    expect(await check('D1', '000731')).toEqual({ outcome: 'success' });
  });

  it('counts mismatches and locks out at the attempt budget', async () => {
    await issuer.issue('D1');

    for (let i = 1; i <= 4; i++) {
      expect(await check('D1', '000000')).toEqual({ outcome: 'failure', reason: 'code_mismatch' });
      expect((await latest())?.attempts).toBe(i);
    }
    expect(await check('D1', '000000')).toEqual({ outcome: 'rate_limited', reason: 'rate_limited' });
    expect(await latest()).toMatchObject({ attempts: 5, status: 'locked_out' });

    expect(await check('D1', '482913')).toEqual({ outcome: 'rate_limited', reason: 'rate_limited' });
  });

  it('expires codes after the TTL', async () => {
    await issuer.issue('D1');
    ctx.clock.advance(TTL_MS + 1);

    expect(await check('D1', '482913')).toEqual({ outcome: 'expired', reason: 'expired' });
    expect((await latest())?.status).toBe('expired');
    expect(await check('D1', '482913')).toEqual({ outcome: 'expired', reason: 'expired' });
  });

  it('still accepts a code at exactly its expiry instant', async () => {
    await issuer.issue('D1');
    ctx.clock.advance(TTL_MS);

    expect(await check('D1', '482913')).toEqual({ outcome: 'success' });
  });

  it('reports expiry before the attempt budget', async () => {
    await issuer.issue('D1');
    for (let i = 0; i < 4; i++) await check('D1', '000000');
    ctx.clock.advance(TTL_MS + 1);

    expect(await check('D1', '000000')).toEqual({ outcome: 'expired', reason: 'expired' });
  });

  it('reports a locked-out code as expired once its TTL has passed', async () => {
    await issuer.issue('D1');
    for (let i = 0; i < 5; i++) await check('D1', '000000');
    expect((await latest())?.status).toBe('locked_out');
    ctx.clock.advance(TTL_MS + 1);

    expect(await check('D1', '482913')).toEqual({ outcome: 'expired', reason: 'expired' });
    expect(await latest()).toMatchObject({ attempts: 5, status: 'expired' });
  });

  it('reports no active code when none was issued', async () => {
    expect(await check('D1', '482913')).toEqual({ outcome: 'failure', reason: 'no_active_code' });
  });

  it('only matches codes of the same document', async () => {
    await registerDocument(ctx, 'D2');
    await issuer.issue('D1');

    expect(await check('D2', '482913')).toEqual({ outcome: 'failure', reason: 'no_active_code' });
    expect((await latest('D1'))?.attempts).toBe(0);
  });
});

describe('isWellFormedCode', () => {
  it('accepts exactly six ASCII digits', () => {
    expect(isWellFormedCode('012345')).toBe(true);
    expect(isWellFormedCode('12345')).toBe(false);
    expect(isWellFormedCode('1234567')).toBe(false);
    expect(isWellFormedCode('12345a')).toBe(false);
    expect(isWellFormedCode('\u0661\u0662\u0663\u0664\u0665\u0666')).toBe(false);
  });
});
