import type { Logger } from "pino";
import type { RagConfig } from "./config.js";
import { buildContext } from "./context-builder.js";
import { embedQuery, type EmbeddingGateway } from "./embedding-service.js";
import type { VectorIndex } from "./vector-store.js";
import type { QueryResult, RetrievedChunk } from "./types.js";

export type RetrievalConfig = Pick<
  RagConfig,
  "topK" | "minScore" | "contextCharBudget" | "queryPrefix" | "maxAttempts" | "retryBaseDelayMs"
>;

export interface RetrieveOptions {
  k?: number;
  signal?: AbortSignal;
}

export function emptyResult(query: string): QueryResult {
  return { query, matches: [], included: [], context: "", citations: [] };
}

export class RetrievalEngine {
  constructor(
    private readonly index: VectorIndex,
    private readonly gateway: EmbeddingGateway,
    private readonly config: RetrievalConfig,
    private readonly logger: Logger,
  ) {}

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<QueryResult> {
    if (!query.trim() || this.index.chunkCount === 0) return emptyResult(query);

    const k = options.k ?? this.config.topK;
    const queryVector = await embedQuery(this.gateway, query, {
      prefix: this.config.queryPrefix,
      retry: { maxAttempts: this.config.maxAttempts, baseDelayMs: this.config.retryBaseDelayMs },
      signal: options.signal,
      logger: this.logger,
    });

    const matches: RetrievedChunk[] = this.index
      .search(queryVector, k)
      .filter((hit) => hit.score >= this.config.minScore)
      .map((hit) => ({
        chunkId: hit.chunkId,
        text: hit.chunk.text,
        metadata: hit.chunk.metadata,
        score: hit.score,
      }));

    const { context, included, citations } = buildContext(matches, this.config.contextCharBudget);
    this.logger.debug(
      { k, matches: matches.length, included: included.length, citations: citations.length },
      "retrieved context",
    );
    return { query, matches, included, context, citations };
  }
}
