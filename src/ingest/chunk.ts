import { ChunkingError } from '../shared/errors.js';
import { cleanText, contentHash } from './normalize.js';
import type { ChunkRecord } from './types.js';

export interface ChunkOptions {
  maxChars: number;
  overlapChars: number;
}

const PARAGRAPH_SEPARATOR = '\n\n';

// Sentence terminators, ASCII and full-width. Runs of terminators stay with their sentence.
const SENTENCE_REGEX = /[^.!?。．！？]*[.!?。．！？]+|[^.!?。．！？]+$/g;
const FULL_WIDTH_END = /[。．！？]$/;

function assertOptions(maxChars: number, overlapChars: number): void {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ChunkingError(`max_chars must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0 || overlapChars >= maxChars) {
    throw new ChunkingError(
      `overlap_chars must be an integer in [0, max_chars), got ${overlapChars} (max_chars=${maxChars})`,
    );
  }
}

export function splitSentences(paragraph: string): string[] {
  return (paragraph.match(SENTENCE_REGEX) ?? []).map((s) => s.trim()).filter((s) => s.length > 0);
}

// Lengths and cuts count code points, so a cut never lands inside a surrogate pair.
export function charLength(text: string): number {
  return Array.from(text).length;
}

function hardSplit(text: string, maxChars: number): string[] {
  const chars = Array.from(text);
  const out: string[] = [];
  for (let i = 0; i < chars.length; i += maxChars) {
    out.push(chars.slice(i, i + maxChars).join(''));
  }
  return out;
}

/**
 * Break a paragraph longer than `maxChars` into pieces that each fit:
 * sentences are regrouped greedily, and a sentence that alone exceeds the limit is sliced.
 */
export function splitLongParagraph(paragraph: string, maxChars: number): string[] {
  if (charLength(paragraph) <= maxChars) return [paragraph];

  const groups: string[] = [];
  let buf = '';
  for (const sentence of splitSentences(paragraph)) {
    if (!buf) {
      buf = sentence;
      continue;
    }
    const joiner = FULL_WIDTH_END.test(buf) ? '' : ' ';
    if (charLength(buf) + joiner.length + charLength(sentence) <= maxChars) {
      buf += joiner + sentence;
    } else {
      groups.push(buf);
      buf = sentence;
    }
  }
  if (buf) groups.push(buf);

  return groups.flatMap((g) => (charLength(g) <= maxChars ? [g] : hardSplit(g, maxChars)));
}

/**
 * Split content into ordered, overlapping chunks of at most `maxChars` characters.
 *
 * A chunk that follows a closed chunk longer than `overlapChars` starts with that
 * chunk's last `overlapChars` characters. When seed and piece together would exceed
 * the limit, the seeded chunk is cut at `maxChars` and the rest of the piece carries on
 * into the next seeded chunk.
 */
export function chunkText(content: string, maxChars: number, overlapChars: number): string[] {
  assertOptions(maxChars, overlapChars);

  const text = cleanText(content);
  if (!text) return [];

  const pieces = text
    .split(/\n{2,}/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .flatMap((p) => splitLongParagraph(p, maxChars));

  const chunks: string[] = [];
  let buf = '';

  for (const piece of pieces) {
    if (!buf) {
      buf = piece;
      continue;
    }
    if (charLength(buf) + PARAGRAPH_SEPARATOR.length + charLength(piece) <= maxChars) {
      buf += PARAGRAPH_SEPARATOR + piece;
      continue;
    }

    chunks.push(buf);
    buf = seedNext(chunks, buf, piece, maxChars, overlapChars);
  }

  if (buf) chunks.push(buf);

  return chunks.filter((c) => c.trim().length > 0);
}

function tailOf(chunk: string, overlapChars: number): string {
  if (overlapChars <= 0) return '';
  const chars = Array.from(chunk);
  return chars.length > overlapChars ? chars.slice(-overlapChars).join('') : '';
}

function seedNext(
  chunks: string[],
  closed: string,
  piece: string,
  maxChars: number,
  overlapChars: number,
): string {
  let tail = tailOf(closed, overlapChars);
  let rest = piece;

  while (tail) {
    const separator =
      charLength(tail) + PARAGRAPH_SEPARATOR.length < maxChars ? PARAGRAPH_SEPARATOR : '';
    const seeded = Array.from(tail + separator + rest);
    if (seeded.length <= maxChars) return seeded.join('');

    const full = seeded.slice(0, maxChars).join('');
    chunks.push(full);
    rest = seeded.slice(maxChars).join('');
    tail = tailOf(full, overlapChars);
  }

  return rest;
}

/**
 * Chunk a document's content and hash every chunk, indexed from 0.
 */
export function buildChunks(content: string, options: ChunkOptions): ChunkRecord[] {
  return chunkText(content, options.maxChars, options.overlapChars).map((text, i) => ({
    chunk_index: i,
    content: text,
    content_hash: contentHash(text),
  }));
}
