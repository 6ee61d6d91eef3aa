#!/usr/bin/env node

import { Command } from 'commander';
import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import {
  CONFIG_FILE_NAME,
  DATABASE_URL_ENV,
  loadConfig,
  requireDatabaseUrl,
  writeDefaultConfig,
  type Config,
} from '../shared/config.js';
import { errorMessage, isFatal } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { initDb, closeDb } from '../db/db.js';
import { pendingMigrations, runMigrations } from '../db/migrate.js';
import { HttpClient } from '../collect/http.js';
import { buildCollectors, selectCollectors } from '../collect/registry.js';
import { HttpEmbeddingGateway } from '../embedding/http.js';
import { charLength, chunkText } from '../ingest/chunk.js';
import {
  countChunks,
  getCorpusCounts,
  getDocument,
  listDocuments,
  setDocumentActive,
} from '../ingest/documentDb.js';
import { runIngest, type IngestStats } from '../ingest/pipeline.js';
import { listRuns } from '../ingest/runDb.js';

const RunStatsSchema = z.object({
  documentsChanged: z.number().default(0),
  documentsWritten: z.number().default(0),
  chunksWritten: z.number().default(0),
});

const program = new Command();

program
  .name('ragsync')
  .description('Incrementally ingest text sources into a vector-embedded corpus')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description(`Write a default ${CONFIG_FILE_NAME} and create the database schema`)
  .option('-f, --force', 'Overwrite an existing config file', false)
  .action(async (opts: { force: boolean }) => {
    const configPath = path.resolve(CONFIG_FILE_NAME);
    if (!fs.existsSync(configPath) || opts.force) {
      writeDefaultConfig(configPath);
      log(`✓ ${CONFIG_FILE_NAME} written`);
    } else {
      log(`✓ ${CONFIG_FILE_NAME} already exists`);
    }

    const { db, cleanup } = openStore();
    try {
      const { applied } = runMigrations(db);
      log(applied.length > 0 ? `✓ ${applied.length} migrations applied` : '✓ Database already up to date');
    } finally {
      cleanup();
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check configuration, database and embedding settings')
  .action(async () => {
    const results: string[] = [];

    let config: Config | null = null;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
    }

    try {
      const { db, cleanup } = openStore();
      try {
        const pending = pendingMigrations(db);
        results.push(
          pending.length > 0
            ? `DB: ${pending.length} pending migrations (run \`ragsync init\`)`
            : `DB: ok (${countChunks(db)} chunks)`,
        );
      } finally {
        cleanup();
      }
    } catch (err) {
      results.push(`DB: error (${errorMessage(err)})`);
    }

    if (config) {
      const gateway = new HttpEmbeddingGateway(config.embedding);
      results.push(gateway.isConfigured() ? `Embedding: ${config.embedding.model}` : 'Embedding: (unconfigured)');
      results.push(`Collectors: ${buildCollectors(config).map((c) => c.name).join(', ') || 'none enabled'}`);
    }

    log(results.join(' | '));
  });

// === ingest ===
program
  .command('ingest')
  .description('Collect from enabled sources and synchronize the store')
  .option('-s, --source <names...>', 'Only run collectors with these names or source tags')
  .option('--no-diff', 'Ignore stored hashes and rebuild every collected document')
  .option('--dry-run', 'Stop after change detection; write nothing', false)
  .action(async (opts: { source?: string[]; diff: boolean; dryRun: boolean }) => {
    // Pre-flight: a missing connection string is fatal before any collection happens
    const config = await loadConfig();
    const { db, cleanup } = openStore();

    const gateway = new HttpEmbeddingGateway(config.embedding);
    const controller = new AbortController();
    const onSigint = (): void => {
      log('Interrupt received, stopping after the current batch...');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
      runMigrations(db);

      const collectors = selectCollectors(buildCollectors(config), opts.source);
      if (collectors.length === 0) {
        log('No collectors enabled. Enable sources in the config file.');
        return;
      }
      if (!opts.dryRun) await gateway.open();

      const http = new HttpClient({
        timeoutMs: config.http.timeout_ms,
        userAgent: config.http.user_agent,
        maxRetries: config.http.max_retries,
      });

      log(`Ingesting from ${collectors.length} collector(s)...`);
      const stats = await runIngest(
        { db, config, gateway, collectors, http },
        { force: opts.diff ? undefined : true, dryRun: opts.dryRun, signal: controller.signal },
      );
      printStats(stats, opts.dryRun);
    } finally {
      process.removeListener('SIGINT', onSigint);
      await gateway.close();
      cleanup();
    }
  });

// === docs ===
const docsCmd = program.command('docs').description('Inspect and manage stored documents');

docsCmd
  .command('list')
  .description('List stored documents')
  .option('-s, --source <source>', 'Filter by source tag')
  .option('-a, --all', 'Include inactive documents', false)
  .option('-n, --limit <n>', 'Max documents to show', '50')
  .action((opts: { source?: string; all: boolean; limit: string }) => {
    const { db, cleanup } = openStore();
    try {
      runMigrations(db);
      const docs = listDocuments(db, {
        source: opts.source,
        activeOnly: !opts.all,
        limit: parseInt(opts.limit, 10),
      });
      if (docs.length === 0) {
        log('No documents stored.');
        return;
      }
      for (const d of docs) {
        const status = d.is_active ? '●' : '○';
        log(`${status} ${d.id.slice(0, 12)} ${d.source.padEnd(10)} ${d.retrieved_at}  ${d.title}`);
      }
      log('');
      for (const c of getCorpusCounts(db)) {
        log(`${c.source.padEnd(12)} ${String(c.active).padStart(5)}/${c.documents} active  ${c.chunks} chunks`);
      }
    } finally {
      cleanup();
    }
  });

docsCmd
  .command('show <id>')
  .description('Show one document and its chunk count')
  .action((id: string) => {
    const { db, cleanup } = openStore();
    try {
      runMigrations(db);
      const doc = getDocument(db, id);
      if (!doc) {
        log(`Document not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      log(`id:           ${doc.id}`);
      log(`source:       ${doc.source}`);
      log(`title:        ${doc.title}`);
      log(`url:          ${doc.url}`);
      log(`content_hash: ${doc.content_hash}`);
      log(`retrieved_at: ${doc.retrieved_at}`);
      log(`active:       ${doc.is_active ? 'yes' : 'no'}`);
      log(`chunks:       ${countChunks(db, doc.id)}`);
    } finally {
      cleanup();
    }
  });

for (const [name, active] of [
  ['deactivate', false],
  ['activate', true],
] as const) {
  docsCmd
    .command(`${name} <id>`)
    .description(`Mark a document ${active ? 'active' : 'inactive'} (chunks are kept)`)
    .action((id: string) => {
      const { db, cleanup } = openStore();
      try {
        runMigrations(db);
        if (!getDocument(db, id)) {
          log(`Document not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        const changed = setDocumentActive(db, id, active);
        log(changed ? `✓ ${id} ${name}d` : `${id} was already ${active ? 'active' : 'inactive'}`);
      } finally {
        cleanup();
      }
    });
}

// === runs ===
program
  .command('runs')
  .description('Show recent ingest runs')
  .option('-n, --limit <n>', 'Number of runs', '10')
  .action((opts: { limit: string }) => {
    const { db, cleanup } = openStore();
    try {
      runMigrations(db);
      const runs = listRuns(db, parseInt(opts.limit, 10));
      if (runs.length === 0) {
        log('No runs recorded.');
        return;
      }
      for (const r of runs) {
        const parsed = RunStatsSchema.safeParse(JSON.parse(r.stats_json));
        const stats = parsed.success ? parsed.data : RunStatsSchema.parse({});
        log(
          `${r.started_at}  ${r.status.padEnd(9)} changed=${stats.documentsChanged} ` +
            `written=${stats.documentsWritten} chunks=${stats.chunksWritten}` +
            (r.error ? `  error: ${r.error}` : ''),
        );
      }
    } finally {
      cleanup();
    }
  });

// === chunk ===
program
  .command('chunk <file>')
  .description('Preview how a text file would be chunked')
  .option('-m, --max-chars <n>', 'Max characters per chunk')
  .option('-o, --overlap-chars <n>', 'Overlap characters between chunks')
  .action(async (file: string, opts: { maxChars?: string; overlapChars?: string }) => {
    const config = await loadConfig();
    const maxChars = opts.maxChars ? parseInt(opts.maxChars, 10) : config.chunking.max_chars;
    const overlap = opts.overlapChars ? parseInt(opts.overlapChars, 10) : config.chunking.overlap_chars;

    const chunks = chunkText(fs.readFileSync(resolvePath(file), 'utf-8'), maxChars, overlap);
    chunks.forEach((c, i) => {
      log(`--- chunk ${i} (${charLength(c)} chars) ---`);
      log(c);
    });
    log(`\n${chunks.length} chunks (max_chars=${maxChars}, overlap_chars=${overlap})`);
  });

// === Helpers ===

function openStore(): { db: ReturnType<typeof initDb>; cleanup: () => void } {
  const url = requireDatabaseUrl();
  const db = initDb(url);
  return { db, cleanup: closeDb };
}

function printStats(stats: IngestStats, dryRun: boolean): void {
  log(dryRun ? '\nDry run complete:' : '\nIngest complete:');
  log(`  Collectors run:     ${stats.collectorsRun} (${stats.collectorsFailed} failed)`);
  log(`  Documents fetched:  ${stats.documentsFetched}`);
  log(`  Rejected:           ${stats.documentsRejected}`);
  log(`  Duplicates:         ${stats.documentsDuplicate}`);
  log(`  Unchanged:          ${stats.documentsUnchanged}`);
  log(`  Changed:            ${stats.documentsChanged}`);
  if (!dryRun) {
    log(`  Written:            ${stats.documentsWritten}`);
    log(`  Failed (embedding): ${stats.documentsFailed}`);
    log(`  Reactivated:        ${stats.documentsReactivated}`);
    log(`  Deactivated:        ${stats.documentsDeactivated}`);
    log(`  Chunks written:     ${stats.chunksWritten} (${stats.chunksDeleted} replaced)`);
  }
  log(`  Duration:           ${stats.durationMs}ms`);
  if (stats.aborted) log('  Run was interrupted; rerun to finish.');

  if (stats.errors.length > 0) {
    log('\nErrors:');
    for (const e of stats.errors) {
      log(`  ${e.scope}: ${e.error}`);
    }
  }
}

function log(msg: string): void {
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: errorMessage(err), fatal: isFatal(err) }, 'Command failed');
  if (!process.env[DATABASE_URL_ENV] && isFatal(err)) {
    log(`Set ${DATABASE_URL_ENV} to a SQLite path, e.g. ${DATABASE_URL_ENV}=file:./data/corpus.db`);
  }
  process.exitCode = 1;
});
