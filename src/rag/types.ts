export interface PageContent {
  pageNumber: number;
  text: string;
}

/** A file in the watched folder; `documentId` is its absolute path. */
export interface SourceDocument {
  documentId: string;
  source: string;
  extension: string;
  contentHash: string;
  mtimeMs: number;
  size: number;
}

export interface ChunkMetadata {
  documentId: string;
  source: string;
  page: number;
  /** Offset of the first character within the page text. */
  start: number;
  /** Exclusive end offset within the page text. */
  end: number;
}

export interface TextChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexedChunk extends TextChunk {
  /** L2-normalised. */
  vector: number[];
}

export interface ManifestEntry {
  contentHash: string;
  chunkIds: string[];
  embeddingModel: string;
  chunkingStrategy: string;
  pageCount: number;
  mtime: number;
  size: number;
  indexedAt: string;
}

export interface Manifest {
  [documentId: string]: ManifestEntry;
}

export interface SearchHit {
  chunkId: string;
  score: number;
  chunk: IndexedChunk;
}

export interface RetrievedChunk {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface Citation {
  documentId: string;
  source: string;
  page: number;
}

export interface QueryResult {
  query: string;
  /** Ranked hits at or above the relevance floor. */
  matches: RetrievedChunk[];
  /** The prefix of `matches` that fit the context budget. */
  included: RetrievedChunk[];
  context: string;
  citations: Citation[];
}

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}
