import type { Logger } from "pino";
import type { ChunkingStrategy } from "./chunking/index.js";
import type { RagConfig } from "./config.js";
import { buildDeltaPlan } from "./delta-plan.js";
import type { DocumentSource, SkippedFile } from "./document-source.js";
import { embedTexts, type EmbeddingGateway } from "./embedding-service.js";
import {
  AbortError,
  EmbeddingPermanentError,
  IndexCorruptionError,
  IndexingFailedError,
  RagError,
  ReindexInProgressError,
  type RagErrorCode,
} from "./errors.js";
import type { SourceDocument, TextChunk } from "./types.js";
import type { VectorIndex } from "./vector-store.js";
import { WriteLock } from "./write-lock.js";

export type ReindexState = "idle" | "scanning" | "diffing" | "applying";

export interface ReindexFailure {
  documentId: string;
  code: RagErrorCode;
  message: string;
}

export interface ReindexReport {
  forced: boolean;
  cancelled: boolean;
  added: string[];
  changed: string[];
  removed: string[];
  unchanged: string[];
  skipped: SkippedFile[];
  /** Documents whose add, update or removal was committed. */
  succeeded: string[];
  failed: ReindexFailure[];
  chunksEmbedded: number;
  durationMs: number;
}

export interface ReindexOptions {
  force?: boolean;
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
}

export interface IndexManagerDeps {
  source: DocumentSource;
  index: VectorIndex;
  gateway: EmbeddingGateway;
  chunker: ChunkingStrategy;
  config: Pick<RagConfig, "embeddingBatchSize" | "embeddingConcurrency" | "maxAttempts" | "retryBaseDelayMs">;
  logger: Logger;
  lock?: WriteLock;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

function toFailure(documentId: string, err: unknown): ReindexFailure {
  // Exhausted transient retries and unexpected faults both mean "this document failed"
  const error = err instanceof RagError && err.code !== "EMBEDDING_TRANSIENT" ? err : new IndexingFailedError(documentId, err);
  return { documentId, code: error.code, message: error.message };
}

/**
 * Brings the vector index in line with the document folder:
 * idle → scanning → diffing → applying → idle. One pass at a time; each
 * document is applied as a single atomic batch.
 */
export class IndexManager {
  private currentState: ReindexState = "idle";
  private readonly lock: WriteLock;
  private readonly now: () => Date;

  constructor(private readonly deps: IndexManagerDeps) {
    this.lock = deps.lock ?? new WriteLock();
    this.now = deps.now ?? (() => new Date());
  }

  get state(): ReindexState {
    return this.currentState;
  }

  async reindex(options: ReindexOptions = {}): Promise<ReindexReport> {
    if (!this.lock.tryAcquire("reindex")) throw new ReindexInProgressError();

    const { index, source, logger } = this.deps;
    const { signal } = options;
    const progress = (message: string) => options.onProgress?.(message);
    const startedAt = performance.now();
    const report: ReindexReport = {
      forced: options.force ?? false,
      cancelled: false,
      added: [],
      changed: [],
      removed: [],
      unchanged: [],
      skipped: [],
      succeeded: [],
      failed: [],
      chunksEmbedded: 0,
      durationMs: 0,
    };

    try {
      this.transition("scanning");
      progress("scanning document folder...");
      const listing = await source.list();

      if (options.force) {
        progress("clearing index for a full rebuild...");
        await index.clear();
      }

      this.transition("diffing");
      const plan = buildDeltaPlan({
        previous: index.manifestGet(),
        discovered: listing.documents,
        skipped: listing.skipped.map((s) => s.documentId),
        embeddingModel: this.deps.gateway.model,
        chunkingStrategy: this.deps.chunker.fingerprint,
      });
      report.added = plan.added.map((d) => d.documentId);
      report.changed = plan.changed.map((d) => d.documentId);
      report.unchanged = plan.unchanged.map((d) => d.documentId);
      report.removed = plan.removed;
      report.skipped = listing.skipped;

      this.transition("applying");
      if (plan.removed.length > 0) progress(`cleaning up ${plan.removed.length} deleted file(s)`);
      for (const documentId of plan.removed) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        await index.batch().deleteByDocument(documentId).manifestDelete(documentId).commit();
        logger.info({ documentId }, "removed document from index");
        report.succeeded.push(documentId);
      }

      const pending = report.cancelled ? [] : [...plan.added, ...plan.changed];
      if (pending.length > 0) progress(`processing ${pending.length} new/changed file(s)`);
      for (const doc of pending) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        try {
          const chunkCount = await this.indexDocument(doc, signal, progress);
          report.succeeded.push(doc.documentId);
          report.chunksEmbedded += chunkCount;
          progress(`${doc.source} done (${chunkCount} chunks)`);
        } catch (err) {
          if (err instanceof AbortError) {
            report.cancelled = true;
            break;
          }
          if (err instanceof IndexCorruptionError) throw err;
          const failure = toFailure(doc.documentId, err);
          report.failed.push(failure);
          logger.error({ documentId: doc.documentId, code: failure.code, err: failure.message }, "indexing failed");
          progress(`${doc.source} failed: ${failure.message}`);
        }
      }
      if (plan.unchanged.length > 0) progress(`${plan.unchanged.length} file(s) cached, skipping`);
    } finally {
      this.transition("idle");
      this.lock.release("reindex");
    }

    report.durationMs = Math.round(performance.now() - startedAt);
    logger.info(
      {
        forced: report.forced,
        cancelled: report.cancelled,
        added: report.added.length,
        changed: report.changed.length,
        removed: report.removed.length,
        unchanged: report.unchanged.length,
        failed: report.failed.length,
        chunksEmbedded: report.chunksEmbedded,
        durationMs: report.durationMs,
      },
      "reindex pass finished",
    );
    progress(
      `ready: ${this.deps.index.documentIds().length} document(s), ${this.deps.index.chunkCount} chunks`,
    );
    return report;
  }

  /** Drops every vector and manifest entry. Refused while a pass runs. */
  async clear(): Promise<void> {
    if (!this.lock.tryAcquire("clear")) {
      throw new ReindexInProgressError("Cannot clear the index while a reindex pass is in progress");
    }
    try {
      await this.deps.index.clear();
    } finally {
      this.lock.release("clear");
    }
  }

  private async indexDocument(
    doc: SourceDocument,
    signal: AbortSignal | undefined,
    progress: (message: string) => void,
  ): Promise<number> {
    const { index, source, chunker, gateway, config, logger } = this.deps;
    const batch = index.batch().deleteByDocument(doc.documentId);

    try {
      progress(`extracting ${doc.source}...`);
      const chunks: TextChunk[] = [];
      let pageCount = 0;
      for await (const page of source.pages(doc)) {
        pageCount++;
        chunks.push(...chunker.chunk(doc, page));
      }
      if (signal?.aborted) throw new AbortError();

      if (chunks.length > 0) {
        progress(`embedding ${doc.source} (${chunks.length} chunks)...`);
        const vectors = await embedTexts(
          gateway,
          chunks.map((c) => c.text),
          {
            batchSize: config.embeddingBatchSize,
            concurrency: config.embeddingConcurrency,
            retry: { maxAttempts: config.maxAttempts, baseDelayMs: config.retryBaseDelayMs },
            signal,
            logger,
            sleep: this.deps.sleep,
            onProgress: (done, total) => progress(`embedding ${doc.source}: ${done}/${total}`),
          },
        );
        chunks.forEach((chunk, i) => {
          const vector = vectors[i];
          if (!vector) throw new EmbeddingPermanentError(`No vector returned for chunk ${i} of ${doc.source}`);
          batch.upsert(chunk, vector);
        });
      } else {
        logger.info({ documentId: doc.documentId }, "document produced no chunks");
      }

      batch.manifestSet(doc.documentId, {
        contentHash: doc.contentHash,
        chunkIds: chunks.map((c) => c.id),
        embeddingModel: gateway.model,
        chunkingStrategy: chunker.fingerprint,
        pageCount,
        mtime: doc.mtimeMs,
        size: doc.size,
        indexedAt: this.now().toISOString(),
      });

      // Last point at which cancellation can take effect for this document
      if (signal?.aborted) throw new AbortError();
      await batch.commit();
      logger.info({ documentId: doc.documentId, pages: pageCount, chunks: chunks.length }, "indexed document");
      return chunks.length;
    } catch (err) {
      batch.discard();
      throw err;
    }
  }

  private transition(next: ReindexState): void {
    this.deps.logger.debug({ from: this.currentState, to: next }, "reindex state");
    this.currentState = next;
  }
}
