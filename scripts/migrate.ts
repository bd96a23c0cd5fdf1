// scripts/migrate.ts
// CLI for database migrations
//
// Usage:
//   npm run migrate            # Apply all pending migrations
//   npm run migrate -- status  # Show migration status
//   npm run migrate -- down    # Roll back the most recent migration

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getConfig } from "../src/config.js";
import { createMigrationRunner } from "../src/migrations/runner.js";

/* ---------- Setup ---------- */
const dbPath = path.resolve(process.cwd(), getConfig().database.path);
fs.mkdirSync(path.dirname(dbPath), { recursive: true });

const db = new Database(dbPath);
db.pragma("foreign_keys = ON");
const runner = createMigrationRunner(db);

/* ---------- CLI Commands ---------- */
function showStatus(): void {
  const statuses = runner.getStatus();

  if (statuses.length === 0) {
    console.log("No migrations found.");
    return;
  }

  console.log(`\nMigration status (${dbPath}):`);
  console.log("─".repeat(60));

  for (const s of statuses) {
    const state = s.applied ? "✓ Applied" : "○ Pending";
    console.log(`  ${s.version}_${s.name}  ${state}`);
    if (s.appliedAt !== null) {
      console.log(`    at ${new Date(s.appliedAt).toISOString()}`);
    }
  }

  console.log(`\nTotal: ${statuses.length} migrations, ${runner.getPending().length} pending`);
}

function applyPending(): number {
  const pending = runner.getPending();
  if (pending.length === 0) {
    console.log("No pending migrations.");
    return 0;
  }

  const result = runner.runAll();
  for (const name of result.applied) {
    console.log(`  ✓ Applied: ${name}`);
  }
  if (result.failed) {
    console.error(`  ✗ Failed: ${result.failed}`);
    return 1;
  }
  return 0;
}

function rollback(): number {
  const name = runner.rollbackLast();
  console.log(name ? `  ↩ Rolled back: ${name}` : "Nothing to roll back.");
  return 0;
}

/* ---------- Main ---------- */
const command = process.argv[2] ?? "up";
let exitCode = 0;

try {
  switch (command) {
    case "status":
      showStatus();
      break;
    case "down":
      exitCode = rollback();
      break;
    case "up":
      exitCode = applyPending();
      break;
    default:
      console.error(`Unknown command: ${command}. Use: up | status | down`);
      exitCode = 1;
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  exitCode = 1;
} finally {
  db.close();
}

process.exit(exitCode);
