import { sha1 } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import type { NormalizedDocument, RawDocument } from './types.js';

export type DuplicatePolicy = 'last_wins' | 'first_wins';

export interface NormalizeOptions {
  minContentChars: number;
  duplicatePolicy?: DuplicatePolicy;
}

export interface NormalizeResult {
  documents: NormalizedDocument[];
  rejected: number;
  duplicates: number;
}

/**
 * Normalize whitespace while keeping paragraph boundaries:
 * unify line endings, trim every line, collapse runs of spaces/tabs,
 * and collapse consecutive blank lines into one.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function documentId(source: string, url: string): string {
  return sha1(`${source}|${url}`);
}

export function contentHash(content: string): string {
  return sha1(content);
}

/**
 * Returns null when the document is noise: no url, or too little content to be worth indexing.
 */
export function normalizeDocument(
  raw: RawDocument,
  minContentChars: number,
): NormalizedDocument | null {
  const url = raw.url.trim();
  if (!url) return null;

  const content = cleanText(raw.content ?? '');
  if (!content || content.length < minContentChars) return null;

  const title = raw.title?.trim();
  return {
    id: documentId(raw.source, url),
    source: raw.source,
    title: title ? title : url,
    url,
    content,
    content_hash: contentHash(content),
    extra: { ...(raw.extra ?? {}) },
  };
}

/**
 * Build the in-memory working set for one run.
 *
 * Documents that resolve to the same id are collapsed according to `duplicatePolicy`:
 * with `last_wins` the later document replaces the earlier one in place,
 * with `first_wins` later ones are ignored.
 */
export function normalizeDocuments(
  raws: readonly RawDocument[],
  options: NormalizeOptions,
): NormalizeResult {
  const policy = options.duplicatePolicy ?? 'last_wins';
  const byId = new Map<string, NormalizedDocument>();
  let rejected = 0;
  let duplicates = 0;

  for (const raw of raws) {
    const doc = normalizeDocument(raw, options.minContentChars);
    if (!doc) {
      rejected++;
      continue;
    }

    if (byId.has(doc.id)) {
      duplicates++;
      logger.debug({ id: doc.id, url: doc.url, policy }, 'Duplicate document identity in run');
      if (policy === 'first_wins') continue;
    }
    // Map.set on an existing key keeps the original insertion position
    byId.set(doc.id, doc);
  }

  return { documents: [...byId.values()], rejected, duplicates };
}
