import { JSDOM } from 'jsdom';
import type { Config } from '../shared/config.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Collector, CollectContext, RawDocument } from './adapter.js';
import { elementText } from './html.js';
import { pickTitleMatch, type TitleCandidate } from './titleRules.js';

export type StatuteConfig = Config['sources']['statute'];

export interface LawEntry extends TitleCandidate {
  lawNo: string;
}

const XML_ACCEPT = ['xml'];

function parseXml(xml: string): Document {
  return new JSDOM(xml, { contentType: 'text/xml' }).window.document;
}

function childText(el: Element, ...names: string[]): string {
  for (const name of names) {
    const found = Array.from(el.getElementsByTagName('*')).find((c) => c.localName === name);
    const text = found?.textContent?.trim();
    if (text) return text;
  }
  return '';
}

/**
 * Read law entries from a law-list response. Entries may be nested under
 * `LawNameListInfo`, `LawList` or `LawInfo` elements depending on the API revision.
 */
export function parseLawList(xml: string): LawEntry[] {
  const doc = parseXml(xml);
  const all = Array.from(doc.getElementsByTagName('*'));

  for (const container of ['LawNameListInfo', 'LawList', 'LawInfo']) {
    const entries: LawEntry[] = [];
    for (const el of all.filter((e) => e.localName === container)) {
      const id = childText(el, 'LawId', 'LawID');
      const title = childText(el, 'LawName');
      if (id && title) {
        entries.push({ id, title, lawNo: childText(el, 'LawNo', 'LawNum') });
      }
    }
    if (entries.length > 0) return entries;
  }
  return [];
}

/**
 * Title and plain text of a law-data response. The body is taken from
 * `LawFullText`, else `LawBody`, else the whole document.
 */
export function parseLawText(xml: string): { title: string; text: string } {
  const doc = parseXml(xml);
  const root = doc.documentElement;
  const all = Array.from(doc.getElementsByTagName('*'));
  const title = all.find((e) => e.localName === 'LawTitle' || e.localName === 'LawName')?.textContent?.trim() ?? '';

  const body =
    all.find((e) => e.localName === 'LawFullText') ?? all.find((e) => e.localName === 'LawBody') ?? root;
  return { title, text: elementText(body) };
}

/**
 * Collects statutes from a law API: one law per configured keyword,
 * chosen by the ordered title rules.
 */
export class StatuteCollector implements Collector {
  readonly name = 'statute';
  readonly source: string;

  constructor(private readonly config: StatuteConfig) {
    this.source = config.source;
  }

  /**
   * Resolve each keyword to at most one law, dropping repeats, capped at `max_laws`.
   */
  selectLaws(laws: readonly LawEntry[]): LawEntry[] {
    const picked: LawEntry[] = [];
    const seen = new Set<string>();
    for (const keyword of this.config.keywords) {
      if (picked.length >= this.config.max_laws) break;
      const match = pickTitleMatch(laws, keyword, this.config);
      if (!match) {
        logger.debug({ keyword }, 'No law title matched keyword');
        continue;
      }
      if (seen.has(match.candidate.id)) continue;
      seen.add(match.candidate.id);
      picked.push(match.candidate);
      logger.debug({ keyword, law: match.candidate.title, rule: match.rule }, 'Law selected');
    }
    return picked;
  }

  async collect(ctx: CollectContext): Promise<RawDocument[]> {
    const base = this.config.base_url.replace(/\/+$/, '');
    const listUrl = `${base}/lawlists/${this.config.category}`;
    const list = await ctx.http.get(listUrl, {
      accept: XML_ACCEPT,
      delayMs: this.config.delay_ms,
      signal: ctx.signal,
    });

    if (list.kind === 'failed') throw list.error;
    if (list.kind === 'empty') {
      logger.info({ url: listUrl, reason: list.reason }, 'Law list is empty');
      return [];
    }

    const laws = this.selectLaws(parseLawList(list.body));
    const docs: RawDocument[] = [];

    for (const law of laws) {
      if (ctx.signal?.aborted) break;
      const dataUrl = `${base}/lawdata/${encodeURIComponent(law.id)}`;
      const outcome = await ctx.http.get(dataUrl, {
        accept: XML_ACCEPT,
        delayMs: this.config.delay_ms,
        signal: ctx.signal,
      });

      if (outcome.kind === 'failed') {
        logger.warn({ law: law.id, error: outcome.error.message }, 'Law text fetch failed');
        continue;
      }
      if (outcome.kind === 'empty') {
        logger.debug({ law: law.id, reason: outcome.reason }, 'Law text empty');
        continue;
      }

      let parsed: { title: string; text: string };
      try {
        parsed = parseLawText(outcome.body);
      } catch (err) {
        const error = new SourceError(`Unparseable law text for ${law.id}`, {
          cause: err instanceof Error ? err.message : String(err),
        });
        logger.warn({ law: law.id, error: error.message }, 'Law text parse failed');
        continue;
      }

      docs.push({
        source: this.source,
        title: parsed.title || law.title,
        url: `${this.config.law_url_base.replace(/\/+$/, '')}/${law.id}`,
        content: parsed.text,
        extra: { law_id: law.id, law_no: law.lawNo },
      });
    }

    logger.info({ collector: this.name, laws: laws.length, docs: docs.length }, 'Statutes collected');
    return docs;
  }
}
