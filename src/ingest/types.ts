/**
 * Raw document as produced by a collector, before normalization.
 */
export interface RawDocument {
  source: string;
  url: string;
  title?: string;
  content: string;
  extra?: Record<string, string>;
}

/**
 * Canonical, content-addressed document. `content` is transient and never persisted.
 */
export interface NormalizedDocument {
  id: string;
  source: string;
  title: string;
  url: string;
  content: string;
  content_hash: string;
  extra: Record<string, string>;
}

export interface ChunkRecord {
  chunk_index: number;
  content: string;
  content_hash: string;
}

export interface EmbeddedChunk extends ChunkRecord {
  embedding: number[];
}

/**
 * A work-set document together with its freshly computed, freshly embedded chunk set.
 */
export interface PreparedDocument {
  document: NormalizedDocument;
  chunks: EmbeddedChunk[];
}

/**
 * Database row shape for the documents table.
 */
export interface DocumentRow {
  id: string;
  source: string;
  title: string;
  url: string;
  content_hash: string;
  retrieved_at: string;
  is_active: number;
  extra_json: string;
}

/**
 * Database row shape for the chunks table.
 */
export interface ChunkRow {
  doc_id: string;
  chunk_index: number;
  content: string;
  content_hash: string;
  embedding: Buffer;
  embedding_dim: number;
}

export interface StoredState {
  content_hash: string;
  is_active: boolean;
}
