import type { Citation, RetrievedChunk } from "./types.js";

export interface AssembledContext {
  context: string;
  /** Chunks whose text made it into `context`, possibly cut short. */
  included: RetrievedChunk[];
  citations: Citation[];
}

const BLOCK_SEPARATOR = "\n\n";

export function sourceLabel(chunk: Pick<RetrievedChunk, "metadata">): string {
  return `[Source: ${chunk.metadata.source}, Page ${chunk.metadata.page}]`;
}

/**
 * Concatenates ranked chunks until `charBudget` would be exceeded; everything
 * after the first chunk that does not fit is dropped. A top chunk that alone
 * exceeds the budget is cut to fit. Citations cover only what was included.
 */
export function buildContext(ranked: RetrievedChunk[], charBudget: number): AssembledContext {
  const blocks: string[] = [];
  const included: RetrievedChunk[] = [];
  let used = 0;

  for (const chunk of ranked) {
    const label = sourceLabel(chunk);
    const separator = blocks.length > 0 ? BLOCK_SEPARATOR.length : 0;
    const block = `${label}\n${chunk.text}`;

    if (used + separator + block.length <= charBudget) {
      blocks.push(block);
      included.push(chunk);
      used += separator + block.length;
      continue;
    }

    if (blocks.length === 0) {
      const room = charBudget - label.length - 1;
      if (room > 0) {
        const text = chunk.text.slice(0, room);
        blocks.push(`${label}\n${text}`);
        included.push({ ...chunk, text });
      }
    }
    break;
  }

  return {
    context: blocks.join(BLOCK_SEPARATOR),
    included,
    citations: collectCitations(included),
  };
}

/** Unique (document, page) pairs in order of first appearance. */
export function collectCitations(chunks: RetrievedChunk[]): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const chunk of chunks) {
    const key = `${chunk.metadata.documentId}\u0000${chunk.metadata.page}`;
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push({
      documentId: chunk.metadata.documentId,
      source: chunk.metadata.source,
      page: chunk.metadata.page,
    });
  }
  return citations;
}

/** `a.pdf p.1, p.3 | b.docx p.1`: documents in citation order, pages ascending. */
export function formatCitations(citations: Citation[]): string {
  const byDocument = new Map<string, { source: string; pages: Set<number> }>();
  for (const citation of citations) {
    let entry = byDocument.get(citation.documentId);
    if (!entry) {
      entry = { source: citation.source, pages: new Set() };
      byDocument.set(citation.documentId, entry);
    }
    entry.pages.add(citation.page);
  }

  return [...byDocument.values()]
    .map(({ source, pages }) => {
      const pageRefs = [...pages]
        .sort((a, b) => a - b)
        .map((p) => `p.${p}`)
        .join(", ");
      return `${source} ${pageRefs}`;
    })
    .join(" | ");
}
