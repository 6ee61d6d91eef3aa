import type { HttpClient } from './http.js';
import type { RawDocument } from '../ingest/types.js';

export type { RawDocument };

export interface CollectContext {
  http: HttpClient;
  signal?: AbortSignal;
}

/**
 * Collector interface. Every source type implements the same capability;
 * source-specific settings are bound at construction time.
 */
export interface Collector {
  /** Unique name, used in logs and for `--source` selection. */
  readonly name: string;
  /** Origin tag written on every document this collector emits. */
  readonly source: string;
  collect(ctx: CollectContext): Promise<RawDocument[]>;
}
