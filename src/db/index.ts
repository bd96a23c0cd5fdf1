// src/db/index.ts
// Database bootstrap: opens better-sqlite3, applies migrations, returns a DbAdapter.

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { SqliteAdapter } from './sqlite.js';
import { createMigrationRunner } from '../migrations/runner.js';
import { createLogger } from '../observability/logger.js';

export type { DbAdapter, RunResult } from './types.js';
export { SqliteAdapter } from './sqlite.js';

const log = createLogger('db');

export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the SQLite database at dbPath and bring its schema up to date.
 * Pass ':memory:' for an ephemeral database (tests).
 */
export function openDatabase(dbPath: string, migrationsDir?: string): SqliteAdapter {
  let rawDb: Database.Database;

  if (dbPath === IN_MEMORY) {
    rawDb = new Database(IN_MEMORY);
  } else {
    const resolved = path.resolve(process.cwd(), dbPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    rawDb = new Database(resolved);
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.pragma('foreign_keys = ON');

  const result = createMigrationRunner(rawDb, migrationsDir).runAll();
  if (result.failed) {
    rawDb.close();
    throw new Error(`Database migration failed: ${result.failed}`);
  }
  if (result.applied.length > 0) {
    log.info({ applied: result.applied, dbPath }, 'Applied database migrations');
  }

  return new SqliteAdapter(rawDb);
}
