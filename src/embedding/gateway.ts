import { EmbeddingError } from '../shared/errors.js';
import { batches, mapWithConcurrency } from '../shared/utils.js';

/**
 * Order-preserving batch contract over an external embedding capability.
 *
 * `embed` returns one vector per input text, in input order, all of one dimension.
 * A failed call is reported as a single error for the whole batch.
 */
export interface EmbeddingGateway {
  open(): Promise<void>;
  embed(texts: string[], modelId: string, normalize: boolean): Promise<number[][]>;
  close(): Promise<void>;
}

export interface BatchOptions {
  modelId: string;
  normalize: boolean;
  batchSize: number;
  concurrency: number;
}

export type BatchResult =
  | { ok: true; start: number; vectors: number[][] }
  | { ok: false; start: number; size: number; error: EmbeddingError };

export function l2Normalize(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
  if (norm === 0) return [...vector];
  return vector.map((x) => x / norm);
}

/**
 * Check the gateway contract on one batch response: same length as the input,
 * finite numbers, one shared dimension.
 */
export function validateVectors(
  vectors: readonly number[][],
  expected: number,
  dimension?: number,
): number {
  if (vectors.length !== expected) {
    throw new EmbeddingError(`Embedding returned ${vectors.length} vectors for ${expected} inputs`);
  }
  let dim = dimension ?? vectors[0]?.length ?? 0;
  for (const v of vectors) {
    if (dim === 0) dim = v.length;
    if (v.length === 0 || v.length !== dim) {
      throw new EmbeddingError(`Inconsistent embedding dimension: expected ${dim}, got ${v.length}`);
    }
    if (!v.every((x) => Number.isFinite(x))) {
      throw new EmbeddingError('Embedding contains non-finite values');
    }
  }
  return dim;
}

/**
 * Embed `texts` in batches of `batchSize`, at most `concurrency` batches in flight.
 * Every batch is reported separately so one failure only affects the texts it carried.
 */
export async function embedBatches(
  gateway: EmbeddingGateway,
  texts: readonly string[],
  options: BatchOptions,
): Promise<BatchResult[]> {
  const size = Math.max(1, options.batchSize);
  const slices = batches(texts, size);

  return mapWithConcurrency(slices, options.concurrency, async (slice, i): Promise<BatchResult> => {
    const start = i * size;
    try {
      const vectors = await gateway.embed(slice, options.modelId, options.normalize);
      validateVectors(vectors, slice.length);
      return { ok: true, start, vectors };
    } catch (err) {
      const error =
        err instanceof EmbeddingError
          ? err
          : new EmbeddingError(`Embedding batch failed: ${err instanceof Error ? err.message : String(err)}`);
      return { ok: false, start, size: slice.length, error };
    }
  });
}
