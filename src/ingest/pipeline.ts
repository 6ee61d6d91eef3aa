import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { StoreError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { batches, nowISO } from '../shared/utils.js';
import type { Collector } from '../collect/adapter.js';
import type { HttpClient } from '../collect/http.js';
import { runCollectors } from '../collect/registry.js';
import { embedBatches, type EmbeddingGateway } from '../embedding/gateway.js';
import { buildChunks } from './chunk.js';
import { detectChanges } from './changes.js';
import { deactivateMissing, getStoredStates, setDocumentActive } from './documentDb.js';
import { documentId, normalizeDocuments } from './normalize.js';
import { finishRun, startRun } from './runDb.js';
import { writeDocuments } from './sync.js';
import type { ChunkRecord, NormalizedDocument, PreparedDocument, RawDocument } from './types.js';

export interface SyncDeps {
  db: Database.Database;
  config: Config;
  /** Already opened by the caller; the pipeline never opens or closes it. */
  gateway: EmbeddingGateway;
}

export interface IngestDeps extends SyncDeps {
  collectors: readonly Collector[];
  http: HttpClient;
}

export interface SyncOptions {
  /** Ignore stored hashes and rebuild every document (overrides `diff.enabled`). */
  force?: boolean;
  /** Stop after change detection; nothing is embedded or written. */
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface IngestStats {
  runId: string | null;
  collectorsRun: number;
  collectorsFailed: number;
  documentsFetched: number;
  documentsRejected: number;
  documentsDuplicate: number;
  documentsUnchanged: number;
  documentsChanged: number;
  documentsWritten: number;
  documentsSkippedConcurrent: number;
  documentsFailed: number;
  documentsReactivated: number;
  documentsDeactivated: number;
  chunksDeleted: number;
  chunksWritten: number;
  errors: Array<{ scope: string; error: string }>;
  aborted: boolean;
  durationMs: number;
}

export function emptyStats(): IngestStats {
  return {
    runId: null,
    collectorsRun: 0,
    collectorsFailed: 0,
    documentsFetched: 0,
    documentsRejected: 0,
    documentsDuplicate: 0,
    documentsUnchanged: 0,
    documentsChanged: 0,
    documentsWritten: 0,
    documentsSkippedConcurrent: 0,
    documentsFailed: 0,
    documentsReactivated: 0,
    documentsDeactivated: 0,
    chunksDeleted: 0,
    chunksWritten: 0,
    errors: [],
    aborted: false,
    durationMs: 0,
  };
}

/**
 * Chunk and embed one write batch. Documents touched by a failed embedding batch
 * are left out, so their stored state stays as the last successful run left it.
 */
async function prepareBatch(
  docs: readonly NormalizedDocument[],
  deps: SyncDeps,
  stats: IngestStats,
): Promise<PreparedDocument[]> {
  const { chunking, embedding } = deps.config;
  const chunkSets: ChunkRecord[][] = docs.map((d) =>
    buildChunks(d.content, { maxChars: chunking.max_chars, overlapChars: chunking.overlap_chars }),
  );

  const texts: string[] = [];
  const owner: number[] = [];
  chunkSets.forEach((chunks, docIndex) => {
    for (const chunk of chunks) {
      texts.push(chunk.content);
      owner.push(docIndex);
    }
  });

  const vectors: Array<number[] | undefined> = new Array(texts.length);
  const failed = new Set<number>();

  const results = await embedBatches(deps.gateway, texts, {
    modelId: embedding.model,
    normalize: embedding.normalize,
    batchSize: embedding.batch_size,
    concurrency: embedding.max_concurrent,
  });

  for (const result of results) {
    if (result.ok) {
      result.vectors.forEach((v, i) => {
        vectors[result.start + i] = v;
      });
      continue;
    }
    const affected = new Set(owner.slice(result.start, result.start + result.size));
    for (const docIndex of affected) failed.add(docIndex);
    logger.warn(
      { error: result.error.message, documents: [...affected].map((i) => docs[i].url) },
      'Embedding batch failed; documents left unchanged this run',
    );
    stats.errors.push({ scope: 'embedding', error: result.error.message });
  }

  const prepared: PreparedDocument[] = [];
  let offset = 0;
  chunkSets.forEach((chunks, docIndex) => {
    const start = offset;
    offset += chunks.length;
    if (failed.has(docIndex)) {
      stats.documentsFailed++;
      return;
    }

    const embedded = chunks.map((chunk, i) => ({ ...chunk, embedding: vectors[start + i] ?? [] }));
    if (embedded.some((c) => c.embedding.length === 0)) {
      stats.documentsFailed++;
      return;
    }
    prepared.push({ document: docs[docIndex], chunks: embedded });
  });

  return prepared;
}

/**
 * Normalize, diff, chunk, embed and write a set of raw documents.
 * Unchanged documents cost one hash lookup and nothing else.
 */
export async function syncDocuments(
  deps: SyncDeps,
  raws: readonly RawDocument[],
  options: SyncOptions = {},
  stats: IngestStats = emptyStats(),
): Promise<IngestStats> {
  const startTime = Date.now();
  const { db, config } = deps;
  const force = options.force ?? !config.diff.enabled;

  const normalized = normalizeDocuments(raws, {
    minContentChars: config.normalize.min_content_chars,
    duplicatePolicy: config.normalize.duplicate_policy,
  });
  stats.documentsFetched += raws.length;
  stats.documentsRejected += normalized.rejected;
  stats.documentsDuplicate += normalized.duplicates;

  const stored = getStoredStates(
    db,
    normalized.documents.map((d) => d.id),
  );
  const changes = detectChanges(normalized.documents, stored, { enabled: !force });
  stats.documentsUnchanged += changes.unchanged.length;
  stats.documentsChanged += changes.workSet.length;

  logger.info(
    {
      documents: normalized.documents.length,
      rejected: normalized.rejected,
      unchanged: changes.unchanged.length,
      changed: changes.workSet.length,
    },
    'Change detection complete',
  );

  if (options.dryRun) {
    stats.durationMs += Date.now() - startTime;
    return stats;
  }

  for (const doc of changes.reactivate) {
    try {
      if (setDocumentActive(db, doc.id, true)) stats.documentsReactivated++;
    } catch (err) {
      throw new StoreError(`Failed to reactivate document ${doc.id}: ${errorMessage(err)}`, { id: doc.id });
    }
  }

  const retrievedAt = nowISO();
  let processed = 0;
  for (const batch of batches(changes.workSet, config.sync.batch_docs)) {
    if (options.signal?.aborted) {
      stats.aborted = true;
      logger.warn({ remaining: changes.workSet.length - processed }, 'Ingest aborted between batches');
      break;
    }
    processed += batch.length;

    const prepared = await prepareBatch(batch, deps, stats);
    const written = writeDocuments(db, prepared, { force, retrievedAt });

    stats.documentsWritten += written.documentsWritten;
    stats.documentsSkippedConcurrent += written.documentsSkipped;
    stats.chunksDeleted += written.chunksDeleted;
    stats.chunksWritten += written.chunksInserted;
  }

  stats.durationMs += Date.now() - startTime;
  return stats;
}

export type IngestOptions = SyncOptions;

/**
 * Full run: collect from every collector, synchronize the store, optionally
 * deactivate documents that disappeared, and record the run.
 */
export async function runIngest(deps: IngestDeps, options: IngestOptions = {}): Promise<IngestStats> {
  const startTime = Date.now();
  const { db, config } = deps;
  const stats = emptyStats();
  const runId = options.dryRun ? null : startRun(db);
  stats.runId = runId;

  try {
    const collected = await runCollectors(
      deps.collectors,
      { http: deps.http, signal: options.signal },
      config.collect.concurrency,
    );
    stats.collectorsRun = collected.outcomes.length;
    for (const outcome of collected.outcomes) {
      if (!outcome.ok) {
        stats.collectorsFailed++;
        stats.errors.push({ scope: `collector:${outcome.name}`, error: outcome.error ?? 'unknown error' });
      }
    }

    if (options.signal?.aborted) {
      stats.aborted = true;
    } else {
      await syncDocuments(deps, collected.documents, options, stats);
    }

    if (config.diff.deactivate_missing && !options.dryRun && !stats.aborted) {
      stats.documentsDeactivated = deactivateUnseen(db, collected.outcomes, collected.documents);
    }
  } catch (err) {
    stats.durationMs = Date.now() - startTime;
    if (runId) finishRun(db, runId, 'failed', stats, errorMessage(err));
    throw err;
  }

  stats.durationMs = Date.now() - startTime;
  if (runId) finishRun(db, runId, stats.aborted ? 'aborted' : 'completed', stats);

  logger.info(
    {
      fetched: stats.documentsFetched,
      changed: stats.documentsChanged,
      unchanged: stats.documentsUnchanged,
      written: stats.documentsWritten,
      chunksWritten: stats.chunksWritten,
      durationMs: stats.durationMs,
    },
    'Ingest complete',
  );
  return stats;
}

/**
 * Only sources whose every collector succeeded are eligible: a failed collector
 * says nothing about which of its documents still exist.
 */
function deactivateUnseen(
  db: Database.Database,
  outcomes: ReadonlyArray<{ source: string; ok: boolean }>,
  documents: readonly RawDocument[],
): number {
  const failedSources = new Set(outcomes.filter((o) => !o.ok).map((o) => o.source));
  const sources = [...new Set(outcomes.map((o) => o.source))].filter((s) => !failedSources.has(s));

  const seen = new Set(documents.map((d) => documentId(d.source, d.url.trim())));
  return deactivateMissing(db, sources, seen);
}
