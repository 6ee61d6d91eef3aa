import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { listMigrations, pendingMigrations, runMigrations } from '../migrate.js';
import { StoreError } from '../../shared/errors.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates documents, chunks and the run ledger', () => {
    const { applied } = runMigrations(db);
    expect(applied).toEqual(['001_init.sql', '002_ingest_runs.sql']);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual(['_migrations', 'chunks', 'documents', 'ingest_runs']);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied.length).toBe(0);
    expect(second.skipped.sort()).toEqual(['001_init.sql', '002_ingest_runs.sql']);
  });

  it('records applied migrations in _migrations table', () => {
    runMigrations(db);

    const rows = db.prepare('SELECT name FROM _migrations ORDER BY name').all() as Array<{ name: string }>;
    expect(rows.map((r) => r.name)).toEqual(['001_init.sql', '002_ingest_runs.sql']);
  });

  it('creates correct indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(indexes.map((i) => i.name)).toEqual([
      'idx_chunks_hash',
      'idx_documents_source',
      'idx_ingest_runs_started',
    ]);
  });

  it('cascades chunk deletion with the owning document', () => {
    runMigrations(db);
    db.prepare(
      `INSERT INTO documents (id, source, title, url, content_hash, retrieved_at) VALUES ('d1', 'web', 't', 'u', 'h', '2024-01-01 00:00:00')`,
    ).run();
    db.prepare(
      `INSERT INTO chunks (doc_id, chunk_index, content, content_hash, embedding, embedding_dim) VALUES ('d1', 0, 'c', 'h', x'00000000', 1)`,
    ).run();

    db.prepare(`DELETE FROM documents WHERE id = 'd1'`).run();
    const row = db.prepare('SELECT COUNT(*) AS n FROM chunks').get() as { n: number };
    expect(row.n).toBe(0);
  });

  it('rejects a negative chunk index', () => {
    runMigrations(db);
    db.prepare(
      `INSERT INTO documents (id, source, title, url, content_hash, retrieved_at) VALUES ('d1', 'web', 't', 'u', 'h', '2024-01-01 00:00:00')`,
    ).run();
    expect(() =>
      db
        .prepare(
          `INSERT INTO chunks (doc_id, chunk_index, content, content_hash, embedding, embedding_dim) VALUES ('d1', -1, 'c', 'h', x'00000000', 1)`,
        )
        .run(),
    ).toThrow();
  });

  it('reports pending migrations without applying them', () => {
    expect(pendingMigrations(db)).toEqual(['001_init.sql', '002_ingest_runs.sql']);
    runMigrations(db);
    expect(pendingMigrations(db)).toEqual([]);
  });

  it('rolls back a failing migration and stops', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragsync-migrations-'));
    fs.writeFileSync(path.join(dir, '001_ok.sql'), 'CREATE TABLE a (id INTEGER);');
    fs.writeFileSync(path.join(dir, '002_bad.sql'), 'CREATE TABLE b (id INTEGER); CREATE TABLE a (id INTEGER);');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    expect(listMigrations(dir)).toEqual(['001_ok.sql', '002_bad.sql']);
    expect(() => runMigrations(db, dir)).toThrow(StoreError);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name IN ('a', 'b') ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(tables.map((t) => t.name)).toEqual(['a']);
    expect(pendingMigrations(db, dir)).toEqual(['002_bad.sql']);
  });
});
