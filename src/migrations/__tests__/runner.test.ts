import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createMigrationRunner, parseMigrationFilename, parseMigrationSql } from '../runner.js';

const MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

function tableNames(db: Database.Database): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all();
  return rows.flatMap((row) =>
    typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string' ? [row.name] : []
  );
}

/* ============= Parsing ============= */

describe('parseMigrationFilename', () => {
  it('splits version and name', () => {
    expect(parseMigrationFilename('001_receipts_and_lock_state.sql')).toEqual({
      version: '001',
      name: 'receipts_and_lock_state',
    });
  });

  it('ignores files that are not migrations', () => {
    expect(parseMigrationFilename('README.md')).toBeNull();
    expect(parseMigrationFilename('receipts.sql')).toBeNull();
  });
});

describe('parseMigrationSql', () => {
  it('splits at the DOWN marker', () => {
    expect(parseMigrationSql('CREATE TABLE t (id INT);\n-- DOWN\nDROP TABLE t;')).toEqual({
      up: 'CREATE TABLE t (id INT);',
      down: 'DROP TABLE t;',
    });
  });

  it('leaves down empty without a marker', () => {
    expect(parseMigrationSql('CREATE TABLE t (id INT);')).toEqual({ up: 'CREATE TABLE t (id INT);', down: '' });
  });
});

/* ============= Runner ============= */

describe('MigrationRunner', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration in order and records it', () => {
    const runner = createMigrationRunner(db, MIGRATIONS_DIR);
    expect(runner.getPending().map((m) => m.version)).toEqual(['001', '002']);

    const result = runner.runAll();
    expect(result).toEqual({
      applied: ['001_receipts_and_lock_state', '002_verification'],
      failed: null,
    });
    expect(runner.getPending()).toEqual([]);
    expect(runner.getStatus().every((s) => s.applied)).toBe(true);
    expect(tableNames(db)).toEqual([
      'lock_states',
      'receipts',
      'schema_migrations',
      'verification_audit',
      'verification_codes',
    ]);
  });

  it('is idempotent', () => {
    createMigrationRunner(db, MIGRATIONS_DIR).runAll();
    expect(createMigrationRunner(db, MIGRATIONS_DIR).runAll()).toEqual({ applied: [], failed: null });
  });

  it('rolls back the most recent migration', () => {
    const runner = createMigrationRunner(db, MIGRATIONS_DIR);
    runner.runAll();

    expect(runner.rollbackLast()).toBe('002_verification');
    expect(tableNames(db)).not.toContain('verification_codes');
    expect(runner.getPending().map((m) => m.version)).toEqual(['002']);
  });

  it('stops at a failing migration', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    try {
      fs.writeFileSync(path.join(dir, '001_ok.sql'), 'CREATE TABLE ok (id INTEGER);');
      fs.writeFileSync(path.join(dir, '002_broken.sql'), 'CREATE TABLE oops (;');
      fs.writeFileSync(path.join(dir, '003_never.sql'), 'CREATE TABLE never (id INTEGER);');

      const result = createMigrationRunner(db, dir).runAll();
      expect(result).toEqual({ applied: ['001_ok'], failed: '002_broken' });
      expect(tableNames(db)).toEqual(['ok', 'schema_migrations']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
