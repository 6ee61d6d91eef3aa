import type Database from 'better-sqlite3';
import { StoreError } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { deleteChunks, getStoredHash, insertChunks, upsertDocument } from './documentDb.js';
import type { PreparedDocument } from './types.js';

export interface WriteOptions {
  /** Replace chunks even when the stored hash already matches (forced rebuild). */
  force?: boolean;
  retrievedAt?: string;
}

export interface WriteResult {
  documentsWritten: number;
  documentsSkipped: number;
  metadataWrites: number;
  chunksDeleted: number;
  chunksInserted: number;
}

/**
 * Write one batch of changed documents: for each, upsert metadata, then replace its
 * whole chunk set. The batch runs in a single IMMEDIATE transaction, so readers never
 * observe a document with its old chunks removed and its new chunks missing, and any
 * failure rolls the batch back.
 *
 * A document whose stored hash already equals the new one is skipped unless `force` is set;
 * that happens when a concurrent run wrote the same content first.
 */
export function writeDocuments(
  db: Database.Database,
  prepared: readonly PreparedDocument[],
  options: WriteOptions = {},
): WriteResult {
  const result: WriteResult = {
    documentsWritten: 0,
    documentsSkipped: 0,
    metadataWrites: 0,
    chunksDeleted: 0,
    chunksInserted: 0,
  };
  if (prepared.length === 0) return result;

  const retrievedAt = options.retrievedAt ?? nowISO();

  const apply = db.transaction((items: readonly PreparedDocument[]) => {
    for (const { document, chunks } of items) {
      if (!options.force && getStoredHash(db, document.id) === document.content_hash) {
        result.documentsSkipped++;
        continue;
      }

      if (upsertDocument(db, document, retrievedAt)) {
        result.metadataWrites++;
      }
      result.chunksDeleted += deleteChunks(db, document.id);
      result.chunksInserted += insertChunks(db, document.id, chunks);
      result.documentsWritten++;
    }
  });

  try {
    apply.immediate(prepared);
  } catch (err) {
    throw new StoreError(
      `Sync transaction failed: ${err instanceof Error ? err.message : String(err)}`,
      { documents: prepared.map((p) => p.document.id) },
    );
  }

  logger.debug(
    {
      written: result.documentsWritten,
      skipped: result.documentsSkipped,
      chunksDeleted: result.chunksDeleted,
      chunksInserted: result.chunksInserted,
    },
    'Sync batch committed',
  );
  return result;
}
