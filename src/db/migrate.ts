import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { StoreError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureLedger(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function appliedNames(db: Database.Database): Set<string> {
  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

/**
 * Migration files in apply order (lexicographic by name).
 */
export function listMigrations(dir: string = defaultMigrationsDir()): string[] {
  if (!fs.existsSync(dir)) {
    throw new StoreError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export function pendingMigrations(db: Database.Database, dir: string = defaultMigrationsDir()): string[] {
  ensureLedger(db);
  const applied = appliedNames(db);
  return listMigrations(dir).filter((f) => !applied.has(f));
}

/**
 * Apply pending migrations, each in its own IMMEDIATE transaction together with its ledger row.
 * A failing migration is rolled back and stops the sequence.
 */
export function runMigrations(db: Database.Database, dir: string = defaultMigrationsDir()): MigrationResult {
  ensureLedger(db);
  const skipped = [...appliedNames(db)];
  const applied: string[] = [];

  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const name of pendingMigrations(db, dir)) {
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(name);
    });

    try {
      apply.immediate();
    } catch (err) {
      throw new StoreError(`Migration failed: ${name}`, {
        migration: name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    applied.push(name);
    logger.debug({ migration: name }, 'Migration applied');
  }

  return { applied, skipped };
}
