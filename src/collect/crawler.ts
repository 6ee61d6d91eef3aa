import type { CrawlerConfig } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import type { Collector, CollectContext, RawDocument } from './adapter.js';
import {
  compilePatterns,
  elementText,
  extractLinks,
  mainContent,
  matchesAny,
  parseHtml,
  pickTitle,
  removeNoise,
} from './html.js';

const HTML_ACCEPT = ['text/html', 'application/xhtml+xml'];
const BINARY_LINK = /\.(pdf|zip|xls|xlsx|doc|docx|ppt|pptx|csv|jpg|jpeg|png|gif)$/i;

/**
 * Breadth-first crawler bounded by URL prefixes. Every visited page contributes links;
 * pages matching the skip-save patterns are traversed but not emitted.
 */
export class WebCrawler implements Collector {
  readonly name: string;
  readonly source: string;
  private readonly allowedPrefixes: string[];
  private readonly exclude: RegExp[];
  private readonly skipTitle: RegExp[];
  private readonly skipUrl: RegExp[];

  constructor(private readonly config: CrawlerConfig) {
    this.name = config.name;
    this.source = config.source;
    this.allowedPrefixes =
      config.allowed_prefixes.length > 0
        ? config.allowed_prefixes
        : config.seeds.map((s) => new URL(s).origin + '/');
    this.exclude = compilePatterns(config.exclude_url_regex);
    this.skipTitle = compilePatterns(config.skip_save_title_regex);
    this.skipUrl = compilePatterns(config.skip_save_url_regex);
  }

  isAllowed(url: string): boolean {
    if (!this.allowedPrefixes.some((p) => url.startsWith(p))) return false;
    if (matchesAny(this.exclude, url)) return false;
    return !BINARY_LINK.test(new URL(url).pathname);
  }

  async collect(ctx: CollectContext): Promise<RawDocument[]> {
    const queue = this.config.seeds.filter((s) => this.isAllowed(s));
    const queued = new Set(queue);
    const visited = new Set<string>();
    const docs: RawDocument[] = [];

    while (queue.length > 0 && visited.size < this.config.max_pages) {
      if (ctx.signal?.aborted) break;
      const url = queue.shift();
      if (url === undefined) break;
      visited.add(url);

      const outcome = await ctx.http.get(url, {
        accept: HTML_ACCEPT,
        delayMs: this.config.delay_ms,
        signal: ctx.signal,
      });
      if (outcome.kind === 'failed') {
        logger.warn({ crawler: this.name, url, error: outcome.error.message }, 'Page fetch failed');
        continue;
      }
      if (outcome.kind === 'empty') {
        logger.debug({ crawler: this.name, url, reason: outcome.reason }, 'Page skipped');
        continue;
      }

      const page = parseHtml(outcome.body, url);

      // Links are read before noise removal so navigation menus still feed the queue
      for (const link of extractLinks(page)) {
        if (queued.has(link.href) || !this.isAllowed(link.href)) continue;
        queued.add(link.href);
        queue.push(link.href);
      }

      removeNoise(page.document);
      const title = pickTitle(page.document);
      const main = mainContent(page.document);
      const content = main ? elementText(main) : '';

      if ((title && matchesAny(this.skipTitle, title)) || matchesAny(this.skipUrl, url)) {
        continue;
      }

      docs.push({
        source: this.source,
        title: title || url,
        url,
        content,
        extra: { ...this.config.extra },
      });
    }

    logger.info({ crawler: this.name, visited: visited.size, docs: docs.length }, 'Crawl finished');
    return docs;
  }
}
