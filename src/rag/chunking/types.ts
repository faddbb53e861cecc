import type { PageContent, SourceDocument, TextChunk } from "../types.js";

export interface ChunkingOptions {
  maxSize: number;
  overlap: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  /** Identifies the strategy and its settings; stored per manifest entry. */
  readonly fingerprint: string;
  chunk(document: SourceDocument, page: PageContent): TextChunk[];
}
