import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { mapWithConcurrency } from '../shared/utils.js';
import type { Collector, CollectContext, RawDocument } from './adapter.js';
import { WebCrawler } from './crawler.js';
import { FeedCollector } from './feed.js';
import { ListingCollector } from './listing.js';
import { StatuteCollector } from './statute.js';

export interface CollectorOutcome {
  name: string;
  source: string;
  ok: boolean;
  documents: number;
  error?: string;
}

export interface CollectResult {
  documents: RawDocument[];
  outcomes: CollectorOutcome[];
}

/**
 * Build the enabled collectors from configuration, in a fixed order:
 * statute, crawlers, listing, feeds.
 */
export function buildCollectors(config: Config): Collector[] {
  const collectors: Collector[] = [];
  const { statute, crawlers, listing, feeds } = config.sources;

  if (statute.enabled) collectors.push(new StatuteCollector(statute));
  for (const crawler of crawlers) {
    if (crawler.enabled) collectors.push(new WebCrawler(crawler));
  }
  if (listing.enabled) collectors.push(new ListingCollector(listing));
  for (const feed of feeds) {
    if (feed.enabled) collectors.push(new FeedCollector(feed));
  }
  return collectors;
}

export function selectCollectors(collectors: readonly Collector[], names?: readonly string[]): Collector[] {
  if (!names || names.length === 0) return [...collectors];
  const wanted = new Set(names);
  return collectors.filter((c) => wanted.has(c.name) || wanted.has(c.source));
}

/**
 * Run collectors with bounded concurrency. A failing collector is logged and
 * contributes no documents; the others are unaffected. Documents keep collector order.
 */
export async function runCollectors(
  collectors: readonly Collector[],
  ctx: CollectContext,
  concurrency: number,
): Promise<CollectResult> {
  const results = await mapWithConcurrency(collectors, concurrency, async (collector): Promise<{ docs: RawDocument[]; outcome: CollectorOutcome }> => {
    const started = Date.now();
    try {
      const docs = await collector.collect(ctx);
      logger.info(
        { collector: collector.name, documents: docs.length, durationMs: Date.now() - started },
        'Collector finished',
      );
      const outcome: CollectorOutcome = {
        name: collector.name,
        source: collector.source,
        ok: true,
        documents: docs.length,
      };
      return { docs, outcome };
    } catch (err) {
      const error = errorMessage(err);
      logger.warn({ collector: collector.name, error }, 'Collector failed');
      const outcome: CollectorOutcome = {
        name: collector.name,
        source: collector.source,
        ok: false,
        documents: 0,
        error,
      };
      return { docs: [], outcome };
    }
  });

  return {
    documents: results.flatMap((r) => r.docs),
    outcomes: results.map((r) => r.outcome),
  };
}
