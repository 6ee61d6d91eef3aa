import type { Config } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Collector, CollectContext, RawDocument } from './adapter.js';
import type { HttpClient } from './http.js';
import {
  compilePatterns,
  elementText,
  extractLinks,
  matchesAny,
  parseHtml,
  removeNoise,
  type HtmlPage,
} from './html.js';

export type ListingConfig = Config['sources']['listing'];

const HTML_ACCEPT = ['text/html', 'application/xhtml+xml'];
const ITEM_PAGE = /\.html?$/i;
const TITLE_MAX = 120;
const LISTING_NOISE =
  'script, style, nav, header, footer, .header, .footer, .breadcrumb, .btn-area, .page-top, .gnav, .menu, .global-nav';

export interface ContentGate {
  minContentChars: number;
  requireAnyKeywords: readonly string[];
  excludeTitles: readonly string[];
  excludeUrl: readonly RegExp[];
  indexMaxLines: number;
  indexMaxChars: number;
}

/**
 * Pages that look like a home page, table of contents or index rather than an item.
 */
export function looksLikeIndexPage(url: string, title: string, text: string, gate: ContentGate): boolean {
  if (gate.excludeTitles.includes(title.trim())) return true;
  if (matchesAny(gate.excludeUrl, url)) return true;
  const lines = text.split('\n').filter((l) => l.trim().length > 0);
  return lines.length <= gate.indexMaxLines && text.length < gate.indexMaxChars;
}

/**
 * Keyword hits let short pages through; otherwise the page must be long enough.
 */
export function passesContentGate(url: string, title: string, text: string, gate: ContentGate): boolean {
  if (!text) return false;
  if (looksLikeIndexPage(url, title, text, gate)) return false;
  if (gate.requireAnyKeywords.some((k) => k.length > 0 && text.includes(k))) return true;
  return text.length >= gate.minContentChars;
}

/**
 * Two-level listing collector: a start page links to listing pages, listing pages
 * link to item pages, and item pages that pass the content gate become documents.
 */
export class ListingCollector implements Collector {
  readonly name = 'listing';
  readonly source: string;
  private readonly gate: ContentGate;

  constructor(private readonly config: ListingConfig) {
    this.source = config.source;
    this.gate = {
      minContentChars: config.min_content_chars,
      requireAnyKeywords: config.require_any_keywords,
      excludeTitles: config.exclude_titles,
      excludeUrl: compilePatterns(config.exclude_url_regex),
      indexMaxLines: config.index_max_lines,
      indexMaxChars: config.index_max_chars,
    };
  }

  private async fetchPage(http: HttpClient, url: string, signal?: AbortSignal): Promise<HtmlPage | null> {
    const outcome = await http.get(url, { accept: HTML_ACCEPT, delayMs: this.config.delay_ms, signal });
    if (outcome.kind === 'ok') return parseHtml(outcome.body, url);
    if (outcome.kind === 'failed') {
      logger.warn({ collector: this.name, url, error: outcome.error.message }, 'Listing fetch failed');
    }
    return null;
  }

  listingUrls(start: HtmlPage): string[] {
    const urls = extractLinks(start)
      .filter((l) => this.config.list_link_text && l.text.includes(this.config.list_link_text))
      .map((l) => l.href);
    // Newest listings usually have the largest volume numbers in their path
    return [...new Set(urls)].sort().reverse();
  }

  itemUrls(listing: HtmlPage): string[] {
    const { item_link_text, exclude_link_text, include_excluded } = this.config;
    return extractLinks(listing)
      .filter((l) => item_link_text && l.text.includes(item_link_text))
      .filter((l) => include_excluded || !exclude_link_text || !l.text.includes(exclude_link_text))
      .map((l) => l.href)
      .filter((href) => ITEM_PAGE.test(new URL(href).pathname))
      .filter((href) => !matchesAny(this.gate.excludeUrl, href));
  }

  async collect(ctx: CollectContext): Promise<RawDocument[]> {
    if (!this.config.start_url) {
      throw new SourceError('Listing collector has no start_url configured');
    }

    const start = await this.fetchPage(ctx.http, this.config.start_url, ctx.signal);
    if (!start) return [];

    const listings = this.listingUrls(start);
    logger.info({ collector: this.name, listings: listings.length }, 'Listing pages found');

    const items: string[] = [];
    for (const listingUrl of listings) {
      if (ctx.signal?.aborted) break;
      const listing = await this.fetchPage(ctx.http, listingUrl, ctx.signal);
      if (!listing) continue;
      for (const url of this.itemUrls(listing)) {
        if (!items.includes(url)) items.push(url);
      }
    }

    const selected = this.config.max_items > 0 ? items.slice(0, this.config.max_items) : items;
    logger.info({ collector: this.name, items: selected.length }, 'Item pages found');

    const docs: RawDocument[] = [];
    for (const url of selected) {
      if (ctx.signal?.aborted) break;
      const page = await this.fetchPage(ctx.http, url, ctx.signal);
      if (!page) continue;

      const doc = page.document;
      const area = doc.querySelector('#contents') ?? doc.querySelector('main') ?? doc.body;
      if (!area) continue;

      removeNoise(area, LISTING_NOISE);
      const text = elementText(area);
      const heading = doc.querySelector('h1')?.textContent?.trim() || doc.title.trim();
      const title = (heading || text.split('\n', 1)[0] || url).slice(0, TITLE_MAX);

      if (!passesContentGate(url, title, text, this.gate)) {
        logger.debug({ collector: this.name, url, chars: text.length, title }, 'Item skipped by content gate');
        continue;
      }

      docs.push({ source: this.source, title, url, content: text });
    }

    logger.info({ collector: this.name, docs: docs.length }, 'Listing collection finished');
    return docs;
  }
}
