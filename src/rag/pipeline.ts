import path from "node:path";
import type { Logger } from "pino";
import { createLogger } from "../logger.js";
import { getChunkingStrategy } from "./chunking/index.js";
import type { RagConfig } from "./config.js";
import { FolderDocumentSource, type DocumentSource } from "./document-source.js";
import { HttpEmbeddingGateway, type EmbeddingGateway } from "./embedding-service.js";
import { defaultExtractors } from "./extractors/index.js";
import { ChatCompletionGenerator, type TextGenerator } from "./generation-service.js";
import { IndexManager, type ReindexOptions, type ReindexReport, type ReindexState } from "./index-manager.js";
import {
  QueryOrchestrator,
  type AnswerOptions,
  type AnswerResult,
  type InspectMode,
  type PageInspection,
  type PageInspectionOutcome,
} from "./query-orchestrator.js";
import { RetrievalEngine } from "./retriever.js";
import { VectorIndex } from "./vector-store.js";

export interface IndexedDocumentStatus {
  documentId: string;
  source: string;
  pageCount: number;
  chunkCount: number;
  indexedAt: string;
}

export interface EngineStatus {
  state: ReindexState;
  documentCount: number;
  chunkCount: number;
  documents: IndexedDocumentStatus[];
}

/** Everything a front end (CLI, HTTP, chat relay) needs to drive the core. */
export interface RagEngine {
  reindex(options?: ReindexOptions): Promise<ReindexReport>;
  clear(): Promise<void>;
  answer(query: string, options?: AnswerOptions): Promise<AnswerResult>;
  inspectPage(documentId: string, pageNumber: number, mode?: InspectMode): Promise<PageInspection>;
  inspectPages(documentId: string, pageNumbers: number[], mode?: InspectMode): Promise<PageInspectionOutcome[]>;
  status(): EngineStatus;
}

/** Collaborators default to the folder, HTTP and pino implementations. */
export interface RagEngineDeps {
  source?: DocumentSource;
  gateway?: EmbeddingGateway;
  generator?: TextGenerator;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RagEngineOptions {
  /**
   * Start from an empty store when the existing one cannot be read. Meant for
   * a forced reindex, which rebuilds everything anyway.
   */
  rebuildCorruptIndex?: boolean;
}

export async function createRagEngine(
  config: RagConfig,
  deps: RagEngineDeps = {},
  options: RagEngineOptions = {},
): Promise<RagEngine> {
  const logger = deps.logger ?? createLogger({ level: config.logLevel, filePath: config.logFilePath });

  const source = deps.source ?? new FolderDocumentSource(config.dataDir, defaultExtractors(), logger);
  const gateway =
    deps.gateway ??
    new HttpEmbeddingGateway({
      baseUrl: config.apiBaseUrl,
      model: config.embeddingModel,
      apiKey: config.apiKey,
      timeoutMs: config.requestTimeoutMs,
    });
  const generator =
    deps.generator ??
    new ChatCompletionGenerator({
      baseUrl: config.apiBaseUrl,
      model: config.generationModel,
      apiKey: config.apiKey,
      timeoutMs: config.requestTimeoutMs,
    });
  const chunker = getChunkingStrategy(config.chunkingStrategy, {
    maxSize: config.chunkSize,
    overlap: config.chunkOverlap,
  });

  const index = await VectorIndex.open(config.indexDir, logger, { rebuildIfCorrupt: options.rebuildCorruptIndex });
  logger.info(
    { indexDir: config.indexDir, documents: index.documentIds().length, chunks: index.chunkCount },
    "index opened",
  );

  const manager = new IndexManager({ source, index, gateway, chunker, config, logger, sleep: deps.sleep });
  const retrieval = new RetrievalEngine(index, gateway, config, logger);
  const orchestrator = new QueryOrchestrator({ retrieval, source, generator, config, logger, sleep: deps.sleep });

  return {
    reindex: (options) => manager.reindex(options),
    clear: () => manager.clear(),
    answer: (query, options) => orchestrator.answer(query, options),
    inspectPage: (documentId, pageNumber, mode) => orchestrator.inspectPage(documentId, pageNumber, mode),
    inspectPages: (documentId, pageNumbers, mode) => orchestrator.inspectPages(documentId, pageNumbers, mode),
    status() {
      const manifest = index.manifestGet();
      const documents = Object.keys(manifest)
        .sort()
        .flatMap((documentId) => {
          const entry = manifest[documentId];
          if (!entry) return [];
          return [
            {
              documentId,
              source: path.basename(documentId),
              pageCount: entry.pageCount,
              chunkCount: entry.chunkIds.length,
              indexedAt: entry.indexedAt,
            },
          ];
        });
      return {
        state: manager.state,
        documentCount: documents.length,
        chunkCount: index.chunkCount,
        documents,
      };
    },
  };
}

export { loadRagConfig, ConfigError, type RagConfig } from "./config.js";
export { formatCitations } from "./context-builder.js";
export * from "./errors.js";
export type * from "./types.js";
export type { ReindexReport, ReindexOptions, ReindexState } from "./index-manager.js";
export type { AnswerResult, AnswerOptions, InspectMode, PageInspection, PageInspectionOutcome } from "./query-orchestrator.js";
export { NO_GROUNDING_MESSAGE } from "./query-orchestrator.js";
