import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { IN_MEMORY, openDatabase, type SqliteAdapter } from '../../db/index.js';
import { createLockStateStore, type LockStateStore } from '../lockStates.js';

let db: SqliteAdapter;
let store: LockStateStore;

beforeEach(() => {
  db = openDatabase(IN_MEMORY);
  store = createLockStateStore(db);
});

afterEach(async () => {
  await db.close();
});

describe('lock state store', () => {
  it('registers a document once', async () => {
    expect(await store.register('doc-1', 1000)).toBe(true);
    expect(await store.register('doc-1', 2000)).toBe(false);
    expect((await store.get('doc-1'))?.sensitiveInputLocked).toBe(true);
  });

  it('returns null for unknown documents', async () => {
    expect(await store.get('nope')).toBeNull();
  });

  it('applies a compare-and-set against the current state', async () => {
    await store.register('doc-1', 1000);
    const current = await store.get('doc-1');
    if (!current) throw new Error('not registered');

    const next = {
      ...current,
      sensitiveInputLocked: false,
      unlockedAt: 5000,
      unlockedMethod: 'token' as const,
      unlockedBy: 'user-7',
    };
    expect(await store.compareAndSet(current, next, 5000)).toBe(true);
    expect(await store.get('doc-1')).toEqual(next);
  });

  it('rejects a compare-and-set from a stale read', async () => {
    await store.register('doc-1', 1000);
    const stale = await store.get('doc-1');
    if (!stale) throw new Error('not registered');

    const unlocked = { ...stale, sensitiveInputLocked: false, unlockedAt: 2000, unlockedMethod: 'code' as const, unlockedBy: 'a' };
    expect(await store.compareAndSet(stale, unlocked, 2000)).toBe(true);
    expect(await store.compareAndSet(stale, { ...unlocked, unlockedBy: 'b' }, 3000)).toBe(false);
    expect((await store.get('doc-1'))?.unlockedBy).toBe('a');
  });
});
