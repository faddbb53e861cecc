import type { Manifest, SourceDocument } from "./types.js";

export interface DeltaPlan {
  added: SourceDocument[];
  changed: SourceDocument[];
  unchanged: SourceDocument[];
  /** Document ids present in the manifest but gone from disk. */
  removed: string[];
}

function byDocumentId(a: { documentId: string }, b: { documentId: string }) {
  return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
}

/**
 * Classifies discovered documents against the manifest. A document is
 * `changed` when its content hash, the embedding model or the chunking
 * fingerprint differ from what was indexed. Ids in `skipped` exist on disk but
 * could not be read, so they are left alone rather than removed.
 */
export function buildDeltaPlan(params: {
  previous: Manifest;
  discovered: SourceDocument[];
  skipped?: string[];
  embeddingModel: string;
  chunkingStrategy: string;
}): DeltaPlan {
  const plan: DeltaPlan = { added: [], changed: [], unchanged: [], removed: [] };

  const seen = new Set<string>();
  for (const doc of [...params.discovered].sort(byDocumentId)) {
    if (seen.has(doc.documentId)) continue;
    seen.add(doc.documentId);

    const entry = params.previous[doc.documentId];
    if (!entry) {
      plan.added.push(doc);
    } else if (
      entry.contentHash !== doc.contentHash ||
      entry.embeddingModel !== params.embeddingModel ||
      entry.chunkingStrategy !== params.chunkingStrategy
    ) {
      plan.changed.push(doc);
    } else {
      plan.unchanged.push(doc);
    }
  }

  const skipped = new Set(params.skipped ?? []);
  plan.removed = Object.keys(params.previous)
    .filter((documentId) => !seen.has(documentId) && !skipped.has(documentId))
    .sort();

  return plan;
}
