import type { NormalizedDocument, StoredState } from './types.js';

export interface ChangeSet {
  /** Stored hash equals the new hash: no chunking, embedding or writing. */
  unchanged: NormalizedDocument[];
  /** New documents, or documents whose hash differs from the stored one. */
  workSet: NormalizedDocument[];
  /** Unchanged documents whose stored row had been deactivated. */
  reactivate: NormalizedDocument[];
}

export interface DetectOptions {
  /** When false every document lands in the work set (forced rebuild). */
  enabled: boolean;
}

export function detectChanges(
  documents: readonly NormalizedDocument[],
  stored: ReadonlyMap<string, StoredState>,
  options: DetectOptions = { enabled: true },
): ChangeSet {
  const result: ChangeSet = { unchanged: [], workSet: [], reactivate: [] };

  for (const doc of documents) {
    const previous = stored.get(doc.id);
    if (options.enabled && previous && previous.content_hash === doc.content_hash) {
      result.unchanged.push(doc);
      if (!previous.is_active) result.reactivate.push(doc);
    } else {
      result.workSet.push(doc);
    }
  }

  return result;
}
