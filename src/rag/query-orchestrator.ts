import type { Logger } from "pino";
import type { RagConfig } from "./config.js";
import type { DocumentSource } from "./document-source.js";
import { GenerationError, PageOutOfRangeError, errorMessage } from "./errors.js";
import type { GenerationRequest, TextGenerator } from "./generation-service.js";
import { runWithRetry } from "./retry.js";
import type { RetrievalEngine } from "./retriever.js";
import type { ChatTurn, Citation, RetrievedChunk } from "./types.js";

export const NO_GROUNDING_MESSAGE =
  "No indexed document contains information relevant to this question.";

export const ANSWER_INSTRUCTION =
  "You are an assistant for question-answering tasks. " +
  "Answer the question using only the retrieved context below. " +
  "If the context does not contain the answer, say that you don't know. " +
  "Cite your sources using the [Source: file, Page N] labels when referencing specific information. " +
  "Keep the answer concise.\n\n--- Retrieved Context ---";

export type InspectMode = "raw" | "translate" | "explain";

export function pageInstruction(mode: Exclude<InspectMode, "raw">, targetLanguage: string): string {
  if (mode === "translate") {
    return `Translate the following document page into ${targetLanguage}. Output only the translation.`;
  }
  return (
    `You are a helpful assistant. Translate the following document page into ${targetLanguage} ` +
    "and then provide a concise summary of its key points."
  );
}

export type AnswerResult =
  | { status: "answered"; text: string; citations: Citation[]; matches: RetrievedChunk[] }
  | { status: "no-grounding"; text: string; citations: Citation[]; matches: RetrievedChunk[] };

export interface AnswerOptions {
  history?: ChatTurn[];
  k?: number;
  signal?: AbortSignal;
}

export interface PageInspection {
  documentId: string;
  source: string;
  pageNumber: number;
  pageCount: number;
  raw: string;
  transformed?: string;
}

export type PageInspectionOutcome =
  | { pageNumber: number; ok: true; inspection: PageInspection }
  | { pageNumber: number; ok: false; error: PageOutOfRangeError };

export interface QueryOrchestratorDeps {
  retrieval: RetrievalEngine;
  source: DocumentSource;
  generator: TextGenerator;
  config: Pick<RagConfig, "targetLanguage" | "maxAttempts" | "retryBaseDelayMs">;
  logger: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class QueryOrchestrator {
  constructor(private readonly deps: QueryOrchestratorDeps) {}

  /**
   * Answers from retrieved context only. When nothing relevant is retrieved
   * the generator is not called at all.
   */
  async answer(query: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const result = await this.deps.retrieval.retrieve(query, { k: options.k, signal: options.signal });
    if (result.included.length === 0) {
      this.deps.logger.info({ matches: result.matches.length }, "no grounding for query");
      return { status: "no-grounding", text: NO_GROUNDING_MESSAGE, citations: [], matches: result.matches };
    }

    const text = await this.generate(
      { instruction: ANSWER_INSTRUCTION, context: result.context, query, history: options.history },
      options.signal,
    );
    return { status: "answered", text, citations: result.citations, matches: result.included };
  }

  /** Reads one page straight from the source, optionally translated or explained. */
  async inspectPage(
    documentId: string,
    pageNumber: number,
    mode: InspectMode = "raw",
    options: { signal?: AbortSignal } = {},
  ): Promise<PageInspection> {
    const { document, pages } = await this.deps.source.readPages(documentId);
    const page = Number.isInteger(pageNumber) ? pages.find((p) => p.pageNumber === pageNumber) : undefined;
    if (!page) throw new PageOutOfRangeError(document.documentId, pageNumber, pages.length);

    const inspection: PageInspection = {
      documentId: document.documentId,
      source: document.source,
      pageNumber,
      pageCount: pages.length,
      raw: page.text,
    };
    if (mode === "raw") return inspection;

    inspection.transformed = page.text.trim()
      ? await this.generate(
          { instruction: pageInstruction(mode, this.deps.config.targetLanguage), context: page.text },
          options.signal,
        )
      : "";
    return inspection;
  }

  /** Several pages of one document; out-of-range pages are reported per page. */
  async inspectPages(
    documentId: string,
    pageNumbers: number[],
    mode: InspectMode = "raw",
    options: { signal?: AbortSignal } = {},
  ): Promise<PageInspectionOutcome[]> {
    const outcomes: PageInspectionOutcome[] = [];
    for (const pageNumber of pageNumbers) {
      try {
        const inspection = await this.inspectPage(documentId, pageNumber, mode, options);
        outcomes.push({ pageNumber, ok: true, inspection });
      } catch (err) {
        if (!(err instanceof PageOutOfRangeError)) throw err;
        outcomes.push({ pageNumber, ok: false, error: err });
      }
    }
    return outcomes;
  }

  private generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const { generator, config, logger } = this.deps;
    return runWithRetry({
      runStep: () => generator.generate(request, signal),
      isRetryableError: (err) => err instanceof GenerationError && err.retryable,
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      signal,
      sleep: this.deps.sleep,
      onRetry: ({ attempt, maxAttempts, error, delayMs }) => {
        logger.warn({ attempt, maxAttempts, delayMs, err: errorMessage(error) }, "generation failed, retrying");
      },
    });
  }
}
