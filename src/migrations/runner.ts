// src/migrations/runner.ts
// Versioned SQL migrations with up/down support.
//
// Migration files live in migrations/ as NNN_name.sql. Up and down SQL are
// separated by a "-- DOWN" marker line.

import type Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../observability/logger.js";

const log = createLogger("migrations");

/* ---------- Types ---------- */
export interface Migration {
  version: string;
  name: string;
  up: string;
  down: string;
}

export interface AppliedMigration {
  id: number;
  name: string;
  applied_at: number;
}

export interface MigrationStatus {
  version: string;
  name: string;
  applied: boolean;
  appliedAt: number | null;
}

/* ---------- Constants ---------- */
const MIGRATION_TABLE = "schema_migrations";
const DOWN_MARKER = "-- DOWN";

export function defaultMigrationsDir(): string {
  return process.env.RECEIPT_GATE_MIGRATIONS_DIR
    ? path.resolve(process.env.RECEIPT_GATE_MIGRATIONS_DIR)
    : path.resolve(process.cwd(), "migrations");
}

/** Split file content into up and down SQL. */
export function parseMigrationSql(content: string): { up: string; down: string } {
  const markerIndex = content.indexOf(DOWN_MARKER);

  if (markerIndex === -1) {
    return { up: content.trim(), down: "" };
  }

  return {
    up: content.slice(0, markerIndex).trim(),
    down: content.slice(markerIndex + DOWN_MARKER.length).trim(),
  };
}

/** "001_initial_schema.sql" → { version: "001", name: "initial_schema" } */
export function parseMigrationFilename(filename: string): { version: string; name: string } | null {
  const match = filename.match(/^(\d+)_(.+)\.sql$/);
  if (!match) return null;
  return { version: match[1], name: match[2] };
}

const fullName = (m: Migration): string => `${m.version}_${m.name}`;

/* ---------- Migration Runner ---------- */
export class MigrationRunner {
  constructor(
    private readonly db: Database.Database,
    private readonly migrationsDir: string
  ) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at INTEGER NOT NULL
      );
    `);
  }

  getAllMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) {
      return [];
    }

    const files = fs.readdirSync(this.migrationsDir)
      .filter(f => f.endsWith(".sql"))
      .sort();

    const migrations: Migration[] = [];
    for (const file of files) {
      const parsed = parseMigrationFilename(file);
      if (!parsed) continue;

      const content = fs.readFileSync(path.join(this.migrationsDir, file), "utf-8");
      migrations.push({ ...parsed, ...parseMigrationSql(content) });
    }

    return migrations;
  }

  getApplied(): AppliedMigration[] {
    return this.db
      .prepare(`SELECT id, name, applied_at FROM ${MIGRATION_TABLE} ORDER BY id ASC`)
      .all() as AppliedMigration[];
  }

  getPending(): Migration[] {
    const applied = new Set(this.getApplied().map(m => m.name));
    return this.getAllMigrations().filter(m => !applied.has(fullName(m)));
  }

  getStatus(): MigrationStatus[] {
    const appliedMap = new Map(this.getApplied().map(m => [m.name, m.applied_at]));

    return this.getAllMigrations().map(m => {
      const appliedAt = appliedMap.get(fullName(m));
      return {
        version: m.version,
        name: m.name,
        applied: appliedAt !== undefined,
        appliedAt: appliedAt ?? null,
      };
    });
  }

  runOne(migration: Migration): void {
    const name = fullName(migration);

    const apply = this.db.transaction(() => {
      this.db.exec(migration.up);
      this.db
        .prepare(`INSERT INTO ${MIGRATION_TABLE} (name, applied_at) VALUES (?, ?)`)
        .run(name, Date.now());
    });

    apply();
  }

  /** Apply all pending migrations in order, stopping at the first failure. */
  runAll(): { applied: string[]; failed: string | null } {
    const applied: string[] = [];

    for (const migration of this.getPending()) {
      const name = fullName(migration);
      try {
        this.runOne(migration);
        applied.push(name);
      } catch (err) {
        log.error({ err, migration: name }, "Failed to apply migration");
        return { applied, failed: name };
      }
    }

    return { applied, failed: null };
  }

  /** Roll back the most recently applied migration; returns its name, or null if none. */
  rollbackLast(): string | null {
    const applied = this.getApplied();
    const last = applied[applied.length - 1];
    if (!last) return null;

    const migration = this.getAllMigrations().find(m => fullName(m) === last.name);
    if (!migration) {
      throw new Error(`Migration file for ${last.name} not found`);
    }
    if (!migration.down) {
      throw new Error(`Migration ${last.name} has no down migration defined`);
    }

    const rollback = this.db.transaction(() => {
      this.db.exec(migration.down);
      this.db.prepare(`DELETE FROM ${MIGRATION_TABLE} WHERE name = ?`).run(last.name);
    });

    rollback();
    return last.name;
  }
}

/* ---------- Factory ---------- */
export function createMigrationRunner(db: Database.Database, migrationsDir?: string): MigrationRunner {
  return new MigrationRunner(db, migrationsDir ?? defaultMigrationsDir());
}
