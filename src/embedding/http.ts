import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { EmbeddingError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';
import { l2Normalize, validateVectors, type EmbeddingGateway } from './gateway.js';

// OpenAI-compatible embeddings API response shape (partial)
const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

type State = 'idle' | 'open' | 'closed';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://api.openai.com/v1';

/**
 * Embedding gateway backed by an OpenAI-compatible `/embeddings` endpoint.
 * Construct once, `open()` before use, `close()` when the run is over.
 */
export class HttpEmbeddingGateway implements EmbeddingGateway {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private state: State = 'idle';
  private dimension: number | undefined;

  constructor(config: Pick<Config['embedding'], 'base_url' | 'api_key' | 'timeout_ms'>) {
    this.baseUrl = config.base_url || DEFAULT_EMBEDDING_BASE_URL;
    this.apiKey = config.api_key;
    this.timeoutMs = config.timeout_ms;
  }

  async open(): Promise<void> {
    if (this.state === 'closed') {
      throw new EmbeddingError('Embedding gateway was closed and cannot be reopened');
    }
    if (!this.isConfigured()) {
      throw new EmbeddingError('Embedding API key is not configured');
    }
    this.state = 'open';
    logger.debug({ baseUrl: this.baseUrl }, 'Embedding gateway opened');
  }

  async close(): Promise<void> {
    this.state = 'closed';
    this.dimension = undefined;
  }

  /** Self-hosted endpoints may run without auth; the hosted default needs a key. */
  isConfigured(): boolean {
    return this.apiKey.length > 0 || this.baseUrl !== DEFAULT_EMBEDDING_BASE_URL;
  }

  async embed(texts: string[], modelId: string, normalize: boolean): Promise<number[][]> {
    if (this.state !== 'open') {
      throw new EmbeddingError(`Embedding gateway is ${this.state}; call open() first`);
    }
    if (texts.length === 0) return [];

    const url = `${this.baseUrl.replace(/\/+$/, '')}/embeddings`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify({ model: modelId, input: texts }),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new EmbeddingError(`Embedding request timed out after ${this.timeoutMs}ms`, { url, model: modelId });
      }
      throw new EmbeddingError(`Embedding request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: modelId,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new EmbeddingError(`Embedding API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new EmbeddingError('Embedding response is not valid JSON', { url });
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError('Embedding response has an unexpected shape', {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (ordered.some((item, i) => item.index !== i)) {
      throw new EmbeddingError('Embedding response indices are not contiguous', { count: ordered.length });
    }

    const vectors = ordered.map((item) => (normalize ? l2Normalize(item.embedding) : item.embedding));
    this.dimension = validateVectors(vectors, texts.length, this.dimension);

    logger.debug(
      { model: parsed.data.model ?? modelId, count: vectors.length, tokens: parsed.data.usage?.total_tokens },
      'Embedding call completed',
    );
    return vectors;
  }
}
