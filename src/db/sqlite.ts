// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// better-sqlite3 is synchronous; driver errors surface as rejected promises.

import type Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types.js';

function runSync(db: Database.Database, sql: string, params: unknown[]): RunResult {
  const result = db.prepare(sql).run(...params);
  return {
    changes: result.changes,
    lastInsertRowid: result.lastInsertRowid,
  };
}

/**
 * Handle passed to transaction callbacks. Shares the connection with the
 * owning adapter; nested transaction() calls run inline.
 */
class SqliteTransaction implements DbAdapter {
  constructor(private readonly _db: Database.Database) {}

  async queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return this._db.prepare(sql).get(...params) as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    return this._db.prepare(sql).all(...params) as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return runSync(this._db, sql, params);
  }

  async exec(sql: string): Promise<void> {
    this._db.exec(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    return Promise.reject(new Error('Cannot close the connection from inside a transaction'));
  }
}

export class SqliteAdapter implements DbAdapter {
  private _db: Database.Database;
  // Tail of the transaction queue. One connection can hold one open transaction.
  private _txTail: Promise<unknown> = Promise.resolve();

  constructor(db: Database.Database) {
    this._db = db;
  }

  /**
   * Expose the underlying better-sqlite3 Database instance.
   * Used ONLY by the migration runner (DDL exec) and health diagnostics.
   */
  get raw(): Database.Database {
    return this._db;
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    return this._db.prepare(sql).get(...params) as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    return this._db.prepare(sql).all(...params) as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return runSync(this._db, sql, params);
  }

  async exec(sql: string): Promise<void> {
    this._db.exec(sql);
  }

  /**
   * better-sqlite3's db.transaction() doesn't support async callbacks, so
   * BEGIN/COMMIT/ROLLBACK are issued manually. The `await` inside fn() yields
   * to other requests, so transactions are queued: a second BEGIN on the same
   * connection would fail, and its statements would otherwise land inside the
   * first transaction.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this._db.exec('BEGIN IMMEDIATE');
      try {
        const result = await fn(new SqliteTransaction(this._db));
        this._db.exec('COMMIT');
        return result;
      } catch (e) {
        if (this._db.inTransaction) {
          this._db.exec('ROLLBACK');
        }
        throw e;
      }
    };

    const next = this._txTail.then(run, run);
    this._txTail = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    this._db.close();
  }
}
