import { createHash } from "node:crypto";
import type { PageContent, SourceDocument, TextChunk } from "../types.js";
import type { ChunkingStrategy, ChunkingOptions } from "./types.js";

export interface ChunkSpan {
  start: number;
  end: number;
  text: string;
}

// Paragraph → line → sentence → word, in order of preference
const SEPARATORS = ["\n\n", "\n", ". ", "。", " "];

/**
 * Finds where a chunk starting at `start` should end. The boundary must lie in
 * (start + overlap, start + maxSize] so the next chunk always advances.
 */
function findBoundary(text: string, start: number, maxSize: number, overlap: number): number {
  const limit = start + maxSize;
  const floor = start + overlap;

  for (const sep of SEPARATORS) {
    const idx = text.lastIndexOf(sep, limit - sep.length);
    if (idx < 0) continue;
    const end = idx + sep.length;
    if (end > floor && end <= limit) return end;
  }

  // No usable separator, e.g. a single token longer than maxSize
  return limit;
}

/**
 * Splits page text into spans of at most `maxSize` characters. Consecutive
 * spans share exactly `overlap` characters and together cover the whole text,
 * except that spans holding only whitespace are dropped.
 */
export function chunkPageText(text: string, maxSize: number, overlap: number): ChunkSpan[] {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new RangeError(`overlap must be an integer in [0, ${maxSize}), got ${overlap}`);
  }
  if (!text.trim()) return [];

  const spans: ChunkSpan[] = [];
  let start = 0;
  for (;;) {
    if (text.length - start <= maxSize) {
      const rest = text.slice(start);
      if (rest.trim()) spans.push({ start, end: text.length, text: rest });
      return spans;
    }
    const end = findBoundary(text, start, maxSize, overlap);
    const span = text.slice(start, end);
    if (span.trim()) spans.push({ start, end, text: span });
    start = end - overlap;
  }
}

export function chunkId(documentId: string, page: number, start: number, text: string): string {
  return createHash("sha256")
    .update(documentId, "utf8")
    .update("\u0000")
    .update(String(page))
    .update("\u0000")
    .update(String(start))
    .update("\u0000")
    .update(text, "utf8")
    .digest("hex");
}

export class PageChunker implements ChunkingStrategy {
  readonly name = "page-chunker";
  private readonly maxSize: number;
  private readonly overlap: number;

  constructor(options: ChunkingOptions) {
    this.maxSize = options.maxSize;
    this.overlap = options.overlap;
    // Fail on construction rather than on the first page
    chunkPageText("x", this.maxSize, this.overlap);
  }

  get fingerprint(): string {
    return `${this.name}:${this.maxSize}:${this.overlap}`;
  }

  chunk(document: SourceDocument, page: PageContent): TextChunk[] {
    return chunkPageText(page.text, this.maxSize, this.overlap).map((span) => ({
      id: chunkId(document.documentId, page.pageNumber, span.start, span.text),
      text: span.text,
      metadata: {
        documentId: document.documentId,
        source: document.source,
        page: page.pageNumber,
        start: span.start,
        end: span.end,
      },
    }));
  }
}
