import type Database from 'better-sqlite3';
import { StoreError } from '../shared/errors.js';
import { batches, nowISO } from '../shared/utils.js';
import type { ChunkRow, DocumentRow, EmbeddedChunk, NormalizedDocument, StoredState } from './types.js';

// SQLite's default limit on bound parameters is 999 for older builds
const LOOKUP_BATCH = 500;

// ================================================================
// Documents
// ================================================================

/**
 * Load the stored content hash and active flag for the given ids.
 */
export function getStoredStates(
  db: Database.Database,
  ids: readonly string[],
): Map<string, StoredState> {
  const states = new Map<string, StoredState>();
  for (const slice of batches(ids, LOOKUP_BATCH)) {
    const placeholders = slice.map(() => '?').join(', ');
    const rows = db
      .prepare(`SELECT id, content_hash, is_active FROM documents WHERE id IN (${placeholders})`)
      .all(...slice) as Array<Pick<DocumentRow, 'id' | 'content_hash' | 'is_active'>>;
    for (const row of rows) {
      states.set(row.id, { content_hash: row.content_hash, is_active: row.is_active === 1 });
    }
  }
  return states;
}

export function getStoredHash(db: Database.Database, id: string): string | null {
  const row = db.prepare('SELECT content_hash FROM documents WHERE id = ?').get(id) as
    | { content_hash: string }
    | undefined;
  return row?.content_hash ?? null;
}

/**
 * Insert or update a document's metadata row. The update only fires when the stored hash
 * differs or the row is inactive, so an already-current row is never rewritten.
 * Returns true when a row was written.
 */
export function upsertDocument(
  db: Database.Database,
  doc: NormalizedDocument,
  retrievedAt: string = nowISO(),
): boolean {
  const result = db
    .prepare(
      `INSERT INTO documents (id, source, title, url, content_hash, retrieved_at, is_active, extra_json)
       VALUES (?, ?, ?, ?, ?, ?, 1, ?)
       ON CONFLICT(id) DO UPDATE SET
         source = excluded.source,
         title = excluded.title,
         url = excluded.url,
         content_hash = excluded.content_hash,
         retrieved_at = excluded.retrieved_at,
         is_active = 1,
         extra_json = excluded.extra_json
       WHERE documents.content_hash IS NOT excluded.content_hash OR documents.is_active = 0`,
    )
    .run(doc.id, doc.source, doc.title, doc.url, doc.content_hash, retrievedAt, JSON.stringify(doc.extra));
  return result.changes > 0;
}

export function setDocumentActive(db: Database.Database, id: string, active: boolean): boolean {
  const result = db
    .prepare('UPDATE documents SET is_active = ? WHERE id = ? AND is_active != ?')
    .run(active ? 1 : 0, id, active ? 1 : 0);
  return result.changes > 0;
}

/**
 * Flip active documents of `sources` that were not seen in this run to inactive.
 * Returns the number of rows flipped.
 */
export function deactivateMissing(
  db: Database.Database,
  sources: readonly string[],
  seenIds: ReadonlySet<string>,
): number {
  if (sources.length === 0) return 0;

  const placeholders = sources.map(() => '?').join(', ');
  const candidates = db
    .prepare(`SELECT id FROM documents WHERE is_active = 1 AND source IN (${placeholders})`)
    .all(...sources) as Array<{ id: string }>;

  const stale = candidates.map((r) => r.id).filter((id) => !seenIds.has(id));
  if (stale.length === 0) return 0;

  const flip = db.prepare('UPDATE documents SET is_active = 0 WHERE id = ?');
  const run = db.transaction((ids: string[]) => {
    let changed = 0;
    for (const id of ids) changed += flip.run(id).changes;
    return changed;
  });

  try {
    return run(stale);
  } catch (err) {
    throw new StoreError(`Failed to deactivate documents: ${err instanceof Error ? err.message : String(err)}`, {
      sources: [...sources],
    });
  }
}

export function getDocument(db: Database.Database, id: string): DocumentRow | undefined {
  return db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentRow | undefined;
}

export function listDocuments(
  db: Database.Database,
  opts: { source?: string; activeOnly?: boolean; limit?: number } = {},
): DocumentRow[] {
  const where: string[] = [];
  const values: unknown[] = [];
  if (opts.source) {
    where.push('source = ?');
    values.push(opts.source);
  }
  if (opts.activeOnly) {
    where.push('is_active = 1');
  }
  const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  values.push(opts.limit ?? -1);
  return db
    .prepare(`SELECT * FROM documents ${clause} ORDER BY source, url LIMIT ?`)
    .all(...values) as DocumentRow[];
}

export function getCorpusCounts(
  db: Database.Database,
): Array<{ source: string; documents: number; active: number; chunks: number }> {
  return db
    .prepare(
      `SELECT d.source AS source,
              COUNT(*) AS documents,
              SUM(d.is_active) AS active,
              COALESCE(SUM((SELECT COUNT(*) FROM chunks c WHERE c.doc_id = d.id)), 0) AS chunks
       FROM documents d
       GROUP BY d.source
       ORDER BY d.source`,
    )
    .all() as Array<{ source: string; documents: number; active: number; chunks: number }>;
}

// ================================================================
// Chunks
// ================================================================

export function encodeEmbedding(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function decodeEmbedding(blob: Buffer): number[] {
  const floats = new Float32Array(blob.byteLength / Float32Array.BYTES_PER_ELEMENT);
  for (let i = 0; i < floats.length; i++) {
    floats[i] = blob.readFloatLE(i * Float32Array.BYTES_PER_ELEMENT);
  }
  return Array.from(floats);
}

export function deleteChunks(db: Database.Database, docId: string): number {
  return db.prepare('DELETE FROM chunks WHERE doc_id = ?').run(docId).changes;
}

export function insertChunks(
  db: Database.Database,
  docId: string,
  chunks: readonly EmbeddedChunk[],
): number {
  const stmt = db.prepare(
    `INSERT INTO chunks (doc_id, chunk_index, content, content_hash, embedding, embedding_dim)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );
  let inserted = 0;
  for (const chunk of chunks) {
    inserted += stmt.run(
      docId,
      chunk.chunk_index,
      chunk.content,
      chunk.content_hash,
      encodeEmbedding(chunk.embedding),
      chunk.embedding.length,
    ).changes;
  }
  return inserted;
}

export function getChunks(db: Database.Database, docId: string): ChunkRow[] {
  return db
    .prepare('SELECT * FROM chunks WHERE doc_id = ? ORDER BY chunk_index')
    .all(docId) as ChunkRow[];
}

export function countChunks(db: Database.Database, docId?: string): number {
  const row = (
    docId
      ? db.prepare('SELECT COUNT(*) AS n FROM chunks WHERE doc_id = ?').get(docId)
      : db.prepare('SELECT COUNT(*) AS n FROM chunks').get()
  ) as { n: number };
  return row.n;
}
