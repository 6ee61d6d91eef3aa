import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { StoreError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

let dbInstance: Database.Database | null = null;

/**
 * Turn a store connection string into a SQLite file path.
 * Accepts a plain path, `file:` or `sqlite:` URLs, and `:memory:`.
 */
export function resolveDatabasePath(connectionString: string): string {
  const trimmed = connectionString.trim();
  if (!trimmed) {
    throw new StoreError('Empty database connection string');
  }

  let location = trimmed;
  const scheme = /^(sqlite|file):/i.exec(trimmed);
  if (scheme) {
    location = trimmed.slice(scheme[0].length);
    // file:///abs/path and sqlite:///abs/path keep one leading slash
    if (location.startsWith('//')) {
      location = location.slice(2);
    }
    const query = location.indexOf('?');
    if (query >= 0) location = location.slice(0, query);
    location = decodeURIComponent(location);
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new StoreError(`Unsupported database connection string scheme: ${trimmed.split(':')[0]}`);
  }

  if (location === ':memory:') return location;
  if (!location) {
    throw new StoreError(`Database connection string has no path: ${trimmed}`);
  }
  return resolvePath(location);
}

export function initDb(connectionString: string): Database.Database {
  if (dbInstance) return dbInstance;

  const resolved = resolveDatabasePath(connectionString);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    if (resolved !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    dbInstance = db;
    logger.debug({ path: resolved }, 'Database initialized');
    return db;
  } catch (err) {
    throw new StoreError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
