export class RagsyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RagsyncError';
  }
}

export class ConfigError extends RagsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class StoreError extends RagsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export class SourceError extends RagsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class EmbeddingError extends RagsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EMBEDDING_ERROR', details);
    this.name = 'EmbeddingError';
  }
}

export class ChunkingError extends RagsyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHUNKING_ERROR', details);
    this.name = 'ChunkingError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Errors that must abort the whole run rather than be recovered per document or per source.
 */
export function isFatal(err: unknown): boolean {
  return err instanceof StoreError || err instanceof ConfigError;
}
