export type { Config, CrawlerConfig, FeedConfig } from './shared/config.js';
export { ConfigSchema, loadConfig, parseConfig, requireDatabaseUrl } from './shared/config.js';
export * from './shared/errors.js';

export { initDb, closeDb, resolveDatabasePath } from './db/db.js';
export { runMigrations, pendingMigrations, type MigrationResult } from './db/migrate.js';

export type * from './ingest/types.js';
export { cleanText, documentId, normalizeDocument, normalizeDocuments } from './ingest/normalize.js';
export { chunkText, buildChunks, splitLongParagraph, splitSentences } from './ingest/chunk.js';
export { detectChanges, type ChangeSet } from './ingest/changes.js';
export { writeDocuments, type WriteResult } from './ingest/sync.js';
export { runIngest, syncDocuments, emptyStats, type IngestStats, type SyncDeps, type IngestDeps } from './ingest/pipeline.js';
export * from './ingest/documentDb.js';

export type { EmbeddingGateway, BatchResult } from './embedding/gateway.js';
export { embedBatches, l2Normalize } from './embedding/gateway.js';
export { HttpEmbeddingGateway } from './embedding/http.js';

export type { Collector, CollectContext } from './collect/adapter.js';
export { HttpClient, type FetchOutcome } from './collect/http.js';
export { buildCollectors, runCollectors, selectCollectors } from './collect/registry.js';
export { pickTitleMatch, TITLE_RULES } from './collect/titleRules.js';
export { StatuteCollector } from './collect/statute.js';
export { WebCrawler } from './collect/crawler.js';
export { ListingCollector } from './collect/listing.js';
export { FeedCollector } from './collect/feed.js';
