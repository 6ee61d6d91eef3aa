import Parser from 'rss-parser';
import type { FeedConfig } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Collector, CollectContext, RawDocument } from './adapter.js';
import { stripHtml } from './html.js';

const FEED_ACCEPT = ['xml', 'rss', 'atom'];

type FeedItem = { contentEncoded?: string };

const parser = new Parser<Record<string, unknown>, FeedItem>({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

/**
 * RSS/Atom feed collector. Each entry with a link becomes one document whose
 * content is the full entry body when the feed carries it, else the snippet.
 */
export class FeedCollector implements Collector {
  readonly name: string;
  readonly source: string;

  constructor(private readonly config: FeedConfig) {
    this.name = config.name;
    this.source = config.source;
  }

  async collect(ctx: CollectContext): Promise<RawDocument[]> {
    const outcome = await ctx.http.get(this.config.url, { accept: FEED_ACCEPT, signal: ctx.signal });
    if (outcome.kind === 'failed') throw outcome.error;
    if (outcome.kind === 'empty') {
      logger.debug({ feed: this.config.url, reason: outcome.reason }, 'Feed empty');
      return [];
    }

    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(outcome.body);
    } catch (err) {
      throw new SourceError(`Feed parse failed: ${err instanceof Error ? err.message : String(err)}`, {
        url: this.config.url,
      });
    }

    const docs: RawDocument[] = [];
    for (const entry of feed.items.slice(0, this.config.max_items)) {
      const url = entry.link?.trim();
      if (!url) continue;

      const body = entry.contentEncoded ?? entry.content;
      const content = body ? stripHtml(body) : (entry.contentSnippet ?? '');
      const extra: Record<string, string> = {};
      if (entry.isoDate) extra['published_at'] = entry.isoDate;
      if (entry.creator) extra['author'] = entry.creator;

      docs.push({ source: this.source, title: entry.title?.trim(), url, content, extra });
    }

    logger.debug({ feed: this.config.url, count: docs.length }, 'Feed fetched');
    return docs;
  }
}
