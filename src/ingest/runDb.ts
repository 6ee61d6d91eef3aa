import type Database from 'better-sqlite3';
import { generateId, nowISO } from '../shared/utils.js';

export type RunStatus = 'running' | 'completed' | 'failed' | 'aborted';

/**
 * Database row shape for the ingest_runs table.
 */
export interface IngestRunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  stats_json: string;
  error: string | null;
}

export function startRun(db: Database.Database): string {
  const id = generateId();
  db.prepare(`INSERT INTO ingest_runs (id, started_at, status) VALUES (?, ?, 'running')`).run(id, nowISO());
  return id;
}

export function finishRun(
  db: Database.Database,
  id: string,
  status: Exclude<RunStatus, 'running'>,
  stats: object,
  error?: string,
): void {
  db.prepare(
    `UPDATE ingest_runs SET finished_at = ?, status = ?, stats_json = ?, error = ? WHERE id = ?`,
  ).run(nowISO(), status, JSON.stringify(stats), error ?? null, id);
}

export function listRuns(db: Database.Database, limit = 20): IngestRunRow[] {
  return db
    .prepare('SELECT * FROM ingest_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit) as IngestRunRow[];
}
