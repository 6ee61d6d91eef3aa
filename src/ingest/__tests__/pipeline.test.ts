import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { parseConfig, type Config } from '../../shared/config.js';
import { StoreError } from '../../shared/errors.js';
import { HttpClient } from '../../collect/http.js';
import type { Collector } from '../../collect/adapter.js';
import { FakeGateway } from '../../embedding/__tests__/fakeGateway.js';
import { buildChunks } from '../chunk.js';
import { countChunks, getChunks, getDocument, setDocumentActive } from '../documentDb.js';
import { documentId } from '../normalize.js';
import { runIngest, syncDocuments } from '../pipeline.js';
import { listRuns } from '../runDb.js';
import type { RawDocument } from '../types.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

function makeConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    normalize: { min_content_chars: 20 },
    chunking: { max_chars: 60, overlap_chars: 10 },
    embedding: { batch_size: 4, max_concurrent: 1 },
    ...overrides,
  });
}

function para(n: number): string {
  return `Paragraph ${n} carries a sentence of moderate length.`;
}

const LONG_A = [para(1), para(2), para(3), para(4)].join('\n\n');
const LONG_B = [para(5), para(6)].join('\n\n');
const SHORT_A = 'A single short replacement body.';

function raw(name: string, content: string, source = 'web'): RawDocument {
  return { source, url: `https://example.com/${name}`, title: name.toUpperCase(), content };
}

const idA = documentId('web', 'https://example.com/a');
const idB = documentId('web', 'https://example.com/b');
const CHUNKING = { maxChars: 60, overlapChars: 10 };

function dump(): unknown {
  return {
    documents: db.prepare('SELECT * FROM documents ORDER BY id').all(),
    chunks: db.prepare('SELECT * FROM chunks ORDER BY doc_id, chunk_index').all(),
  };
}

describe('syncDocuments', () => {
  it('writes new documents with their embedded chunks', async () => {
    const gateway = new FakeGateway();
    const stats = await syncDocuments({ db, config: makeConfig(), gateway }, [raw('a', LONG_A), raw('b', LONG_B)]);

    const expectedA = buildChunks(LONG_A, CHUNKING);
    const expectedB = buildChunks(LONG_B, CHUNKING);

    expect(stats.documentsChanged).toBe(2);
    expect(stats.documentsWritten).toBe(2);
    expect(stats.chunksWritten).toBe(expectedA.length + expectedB.length);
    expect(gateway.embeddedTexts).toBe(expectedA.length + expectedB.length);

    const rows = getChunks(db, idA);
    expect(rows.map((r) => r.content)).toEqual(expectedA.map((c) => c.content));
    expect(rows.map((r) => r.content_hash)).toEqual(expectedA.map((c) => c.content_hash));
    expect(rows[0].embedding_dim).toBe(2);
    expect(getDocument(db, idA)?.title).toBe('A');
  });

  it('is idempotent: an unchanged second run embeds and writes nothing', async () => {
    const gateway = new FakeGateway();
    const deps = { db, config: makeConfig(), gateway };
    await syncDocuments(deps, [raw('a', LONG_A), raw('b', LONG_B)]);
    const before = dump();
    const callsBefore = gateway.calls.length;

    const stats = await syncDocuments(deps, [raw('a', LONG_A), raw('b', LONG_B)]);

    expect(stats.documentsUnchanged).toBe(2);
    expect(stats.documentsChanged).toBe(0);
    expect(stats.documentsWritten).toBe(0);
    expect(stats.chunksDeleted).toBe(0);
    expect(gateway.calls.length).toBe(callsBefore);
    expect(dump()).toEqual(before);
  });

  it('replaces the full chunk set of a changed document', async () => {
    const gateway = new FakeGateway();
    const deps = { db, config: makeConfig(), gateway };
    await syncDocuments(deps, [raw('a', LONG_A), raw('b', LONG_B)]);
    const oldCount = countChunks(db, idA);
    const chunksOfB = getChunks(db, idB);

    const stats = await syncDocuments(deps, [raw('a', SHORT_A), raw('b', LONG_B)]);

    expect(oldCount).toBeGreaterThan(1);
    expect(stats.documentsChanged).toBe(1);
    expect(stats.documentsUnchanged).toBe(1);
    expect(stats.chunksDeleted).toBe(oldCount);
    expect(getChunks(db, idA).map((r) => [r.chunk_index, r.content])).toEqual([[0, SHORT_A]]);
    expect(getChunks(db, idB)).toEqual(chunksOfB);
  });

  it('rejects documents below the content minimum', async () => {
    const gateway = new FakeGateway();
    const stats = await syncDocuments({ db, config: makeConfig(), gateway }, [raw('a', 'too short'), raw('b', LONG_B)]);

    expect(stats.documentsRejected).toBe(1);
    expect(stats.documentsWritten).toBe(1);
    expect(getDocument(db, idA)).toBeUndefined();
  });

  it('leaves documents touched by a failed embedding batch unchanged', async () => {
    const config = makeConfig({ embedding: { batch_size: 1, max_concurrent: 1 } });
    await syncDocuments({ db, config, gateway: new FakeGateway() }, [raw('b', LONG_B)]);
    const storedB = getDocument(db, idB);
    const chunksB = getChunks(db, idB);

    const gateway = new FakeGateway({ failWhen: (t) => t.includes('FAIL') });
    const stats = await syncDocuments({ db, config, gateway }, [
      raw('a', LONG_A),
      raw('b', `${LONG_B}\n\nThis paragraph will FAIL to embed.`),
    ]);

    expect(stats.documentsChanged).toBe(2);
    expect(stats.documentsFailed).toBe(1);
    expect(stats.documentsWritten).toBe(1);
    expect(stats.errors).toEqual([
      { scope: 'embedding', error: 'Embedding batch failed: upstream rejected the batch' },
    ]);
    expect(getDocument(db, idB)).toEqual(storedB);
    expect(getChunks(db, idB)).toEqual(chunksB);
    expect(countChunks(db, idA)).toBe(buildChunks(LONG_A, CHUNKING).length);
  });

  it('rebuilds every document under force', async () => {
    const gateway = new FakeGateway();
    const deps = { db, config: makeConfig(), gateway };
    const first = await syncDocuments(deps, [raw('a', LONG_A), raw('b', LONG_B)]);

    const stats = await syncDocuments(deps, [raw('a', LONG_A), raw('b', LONG_B)], { force: true });

    expect(stats.documentsChanged).toBe(2);
    expect(stats.documentsWritten).toBe(2);
    expect(stats.chunksDeleted).toBe(first.chunksWritten);
    expect(stats.chunksWritten).toBe(first.chunksWritten);
  });

  it('treats diff.enabled=false as a forced rebuild', async () => {
    const gateway = new FakeGateway();
    await syncDocuments({ db, config: makeConfig(), gateway }, [raw('b', LONG_B)]);

    const stats = await syncDocuments(
      { db, config: makeConfig({ diff: { enabled: false } }), gateway },
      [raw('b', LONG_B)],
    );
    expect(stats.documentsUnchanged).toBe(0);
    expect(stats.documentsWritten).toBe(1);
  });

  it('reactivates an unchanged inactive document without re-embedding', async () => {
    const gateway = new FakeGateway();
    const deps = { db, config: makeConfig(), gateway };
    await syncDocuments(deps, [raw('a', LONG_A)]);
    setDocumentActive(db, idA, false);
    const callsBefore = gateway.calls.length;

    const stats = await syncDocuments(deps, [raw('a', LONG_A)]);

    expect(stats.documentsReactivated).toBe(1);
    expect(stats.documentsWritten).toBe(0);
    expect(gateway.calls.length).toBe(callsBefore);
    expect(getDocument(db, idA)?.is_active).toBe(1);
  });

  it('writes nothing on a dry run', async () => {
    const gateway = new FakeGateway();
    const stats = await syncDocuments({ db, config: makeConfig(), gateway }, [raw('a', LONG_A)], { dryRun: true });

    expect(stats.documentsChanged).toBe(1);
    expect(stats.documentsWritten).toBe(0);
    expect(gateway.calls).toEqual([]);
    expect(getDocument(db, idA)).toBeUndefined();
  });

  it('stops before the first batch when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const gateway = new FakeGateway();

    const stats = await syncDocuments({ db, config: makeConfig(), gateway }, [raw('a', LONG_A)], {
      signal: controller.signal,
    });

    expect(stats.aborted).toBe(true);
    expect(stats.documentsWritten).toBe(0);
    expect(countChunks(db)).toBe(0);
  });

  it('finishes the current batch and stops at the next boundary on abort', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway({ onEmbed: () => controller.abort() });
    const config = makeConfig({ sync: { batch_docs: 1 } });

    const stats = await syncDocuments({ db, config, gateway }, [raw('a', LONG_A), raw('b', LONG_B)], {
      signal: controller.signal,
    });

    expect(stats.aborted).toBe(true);
    expect(stats.documentsWritten).toBe(1);
    expect(countChunks(db, idA)).toBe(buildChunks(LONG_A, CHUNKING).length);
    expect(getDocument(db, idB)).toBeUndefined();
  });
});

describe('runIngest', () => {
  const http = new HttpClient({ timeoutMs: 1000, userAgent: 'ragsync-test', maxRetries: 0 });

  function collector(name: string, docs: RawDocument[] | Error, source = 'web'): Collector {
    return {
      name,
      source,
      async collect() {
        if (docs instanceof Error) throw docs;
        return docs;
      },
    };
  }

  it('records a completed run in the ledger', async () => {
    const stats = await runIngest({
      db,
      config: makeConfig(),
      gateway: new FakeGateway(),
      http,
      collectors: [collector('site', [raw('a', LONG_A)])],
    });

    const runs = listRuns(db);
    expect(runs).toHaveLength(1);
    expect(runs[0].id).toBe(stats.runId);
    expect(runs[0].status).toBe('completed');
    expect(runs[0].error).toBeNull();
    expect(JSON.parse(runs[0].stats_json).documentsWritten).toBe(1);
  });

  it('isolates a failing collector', async () => {
    const stats = await runIngest({
      db,
      config: makeConfig(),
      gateway: new FakeGateway(),
      http,
      collectors: [collector('broken', new Error('boom')), collector('site', [raw('b', LONG_B)])],
    });

    expect(stats.collectorsRun).toBe(2);
    expect(stats.collectorsFailed).toBe(1);
    expect(stats.errors).toEqual([{ scope: 'collector:broken', error: 'boom' }]);
    expect(stats.documentsWritten).toBe(1);
  });

  it('deactivates documents that disappeared when enabled', async () => {
    const config = makeConfig({ diff: { deactivate_missing: true } });
    const gateway = new FakeGateway();
    await runIngest({ db, config, gateway, http, collectors: [collector('site', [raw('a', LONG_A), raw('b', LONG_B)])] });
    const chunksB = countChunks(db, idB);

    const stats = await runIngest({ db, config, gateway, http, collectors: [collector('site', [raw('a', LONG_A)])] });

    expect(stats.documentsDeactivated).toBe(1);
    expect(getDocument(db, idB)?.is_active).toBe(0);
    expect(countChunks(db, idB)).toBe(chunksB);
    expect(getDocument(db, idA)?.is_active).toBe(1);
  });

  it('keeps documents active when deactivation is off', async () => {
    const gateway = new FakeGateway();
    await runIngest({ db, config: makeConfig(), gateway, http, collectors: [collector('site', [raw('b', LONG_B)])] });
    const stats = await runIngest({ db, config: makeConfig(), gateway, http, collectors: [collector('site', [])] });

    expect(stats.documentsDeactivated).toBe(0);
    expect(getDocument(db, idB)?.is_active).toBe(1);
  });

  it('does not deactivate a source whose collector failed', async () => {
    const config = makeConfig({ diff: { deactivate_missing: true } });
    const gateway = new FakeGateway();
    await runIngest({ db, config, gateway, http, collectors: [collector('site', [raw('a', LONG_A), raw('b', LONG_B)])] });

    const stats = await runIngest({
      db,
      config,
      gateway,
      http,
      collectors: [collector('site', [raw('a', LONG_A)]), collector('mirror', new Error('offline'))],
    });

    expect(stats.documentsDeactivated).toBe(0);
    expect(getDocument(db, idB)?.is_active).toBe(1);
  });

  it('marks the run failed and rethrows on a store failure', async () => {
    db.exec('DROP TABLE chunks');

    await expect(
      runIngest({
        db,
        config: makeConfig(),
        gateway: new FakeGateway(),
        http,
        collectors: [collector('site', [raw('a', LONG_A)])],
      }),
    ).rejects.toBeInstanceOf(StoreError);

    const runs = listRuns(db);
    expect(runs[0].status).toBe('failed');
    expect(runs[0].error).toMatch(/^Sync transaction failed: /);
    expect(getDocument(db, idA)).toBeUndefined();
  });

  it('records no run on a dry run', async () => {
    const stats = await runIngest(
      { db, config: makeConfig(), gateway: new FakeGateway(), http, collectors: [collector('site', [raw('a', LONG_A)])] },
      { dryRun: true },
    );

    expect(stats.runId).toBeNull();
    expect(listRuns(db)).toEqual([]);
  });
});
