import { describe, it, expect } from 'vitest';
import { buildChunks, charLength, chunkText, splitLongParagraph, splitSentences } from '../chunk.js';
import { ChunkingError } from '../../shared/errors.js';
import { sha1 } from '../../shared/utils.js';

const LONG_TEXT = [
  'The committee met on Monday. It reviewed the annual budget! Several members asked questions? The chair answered each one.',
  'A second paragraph follows here with enough words to matter for packing.',
  '短い文です。次の文も短いです。最後の文はもう少しだけ長くなっています。',
  'x'.repeat(140),
  'Closing remarks were brief. The meeting adjourned at noon.',
].join('\n\n');

function assertOverlap(chunks: string[], k: number): void {
  for (let i = 0; i + 1 < chunks.length; i++) {
    if (k > 0 && chunks[i].length > k) {
      expect(chunks[i + 1].slice(0, k)).toBe(chunks[i].slice(-k));
    }
  }
}

describe('splitSentences', () => {
  it('keeps terminal punctuation with each sentence', () => {
    expect(splitSentences('Alpha. Beta! Gamma?')).toEqual(['Alpha.', 'Beta!', 'Gamma?']);
  });

  it('handles full-width terminators and trailing text', () => {
    expect(splitSentences('一文目。二文目！残り')).toEqual(['一文目。', '二文目！', '残り']);
  });
});

describe('splitLongParagraph', () => {
  it('returns short paragraphs untouched', () => {
    expect(splitLongParagraph('short one', 20)).toEqual(['short one']);
  });

  it('regroups full-width sentences without a joining space', () => {
    expect(splitLongParagraph('あいう。かきく。さしす。', 8)).toEqual(['あいう。かきく。', 'さしす。']);
  });

  it('hard-splits a sentence without punctuation into max-sized slices', () => {
    expect(splitLongParagraph('y'.repeat(25), 10)).toEqual(['y'.repeat(10), 'y'.repeat(10), 'y'.repeat(5)]);
  });
});

describe('chunkText', () => {
  it('splits on sentence punctuation before packing', () => {
    expect(chunkText('Alpha. Beta. Gamma.', 6, 0)).toEqual(['Alpha.', 'Beta.', 'Gamma.']);
  });

  it('packs paragraphs that fit into one chunk', () => {
    expect(chunkText('First paragraph.\n\n\n\nSecond one.', 100, 10)).toEqual([
      'First paragraph.\n\nSecond one.',
    ]);
  });

  it('seeds the next chunk with the tail of the previous one', () => {
    expect(chunkText('abcdefghij\n\nklm', 12, 3)).toEqual(['abcdefghij', 'hij\n\nklm']);
  });

  it('cuts a seeded chunk that would overflow and carries the rest forward', () => {
    expect(chunkText('abcdefghij\n\nklmnopqrst', 15, 4)).toEqual([
      'abcdefghij',
      'ghij\n\nklmnopqrs',
      'pqrs\n\nt',
    ]);
  });

  it('does not seed after a chunk no longer than the overlap', () => {
    expect(chunkText('abc\n\ndefghijk', 10, 3)).toEqual(['abc', 'defghijk']);
  });

  it('returns nothing for blank content', () => {
    expect(chunkText('  \n\n \t \n', 10, 2)).toEqual([]);
  });

  it('is deterministic', () => {
    expect(chunkText(LONG_TEXT, 50, 12)).toEqual(chunkText(LONG_TEXT, 50, 12));
  });

  it.each([
    [30, 0],
    [30, 5],
    [50, 12],
    [80, 40],
    [10, 9],
    [5, 4],
  ])('keeps every chunk within max_chars=%i (overlap %i)', (max, overlap) => {
    const chunks = chunkText(LONG_TEXT, max, overlap);
    expect(chunks.length).toBeGreaterThan(1);
    for (const c of chunks) {
      expect(c.length).toBeLessThanOrEqual(max);
      expect(c.trim().length).toBeGreaterThan(0);
    }
  });

  it.each([
    [30, 5],
    [50, 12],
    [80, 40],
    [10, 9],
  ])('repeats the boundary overlap (max_chars=%i, overlap %i)', (max, overlap) => {
    assertOverlap(chunkText(LONG_TEXT, max, overlap), overlap);
  });

  it('rejects overlap not smaller than max_chars', () => {
    expect(() => chunkText('text', 10, 10)).toThrow(ChunkingError);
  });

  it('rejects a non-positive max_chars', () => {
    expect(() => chunkText('text', 0, 0)).toThrow(ChunkingError);
  });
});

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

describe('chunkText with characters outside the BMP', () => {
  it('cuts between code points, never inside a surrogate pair', () => {
    expect(chunkText('😀'.repeat(5), 3, 0)).toEqual(['😀😀😀', '😀😀']);
  });

  it('counts max_chars and overlap in code points', () => {
    const chunks = chunkText('𠮷'.repeat(7), 3, 1);
    expect(chunks).toEqual(['𠮷𠮷𠮷', '𠮷𠮷𠮷', '𠮷𠮷', '𠮷𠮷']);
    for (const c of chunks) {
      expect(charLength(c)).toBeLessThanOrEqual(3);
      expect(LONE_SURROGATE.test(c)).toBe(false);
    }
  });

  it('keeps mixed text well formed across paragraph and sentence cuts', () => {
    const text = ['吉野家の𠮷は異体字です。絵文字😀も入ります。', '🎌'.repeat(25), '終わり𠮷。'].join('\n\n');
    const chunks = chunkText(text, 10, 3);
    expect(chunks.length).toBeGreaterThan(3);
    for (const c of chunks) {
      expect(charLength(c)).toBeLessThanOrEqual(10);
      expect(LONE_SURROGATE.test(c)).toBe(false);
    }
  });
});

describe('buildChunks', () => {
  it('indexes chunks from zero and hashes each one', () => {
    const chunks = buildChunks('Alpha. Beta. Gamma.', { maxChars: 6, overlapChars: 0 });
    expect(chunks).toEqual([
      { chunk_index: 0, content: 'Alpha.', content_hash: sha1('Alpha.') },
      { chunk_index: 1, content: 'Beta.', content_hash: sha1('Beta.') },
      { chunk_index: 2, content: 'Gamma.', content_hash: sha1('Gamma.') },
    ]);
  });
});
