export type RagErrorCode =
  | "SOURCE_READ"
  | "DOCUMENT_NOT_FOUND"
  | "EMBEDDING_TRANSIENT"
  | "EMBEDDING_PERMANENT"
  | "INDEXING_FAILED"
  | "INDEX_CORRUPTION"
  | "PAGE_OUT_OF_RANGE"
  | "GENERATION_FAILED"
  | "REINDEX_IN_PROGRESS"
  | "ABORTED";

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceReadError extends RagError {
  readonly code = "SOURCE_READ";
  readonly filePath: string;
  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot read ${filePath}: ${reason}`, options);
    this.filePath = filePath;
  }
}

export class DocumentNotFoundError extends RagError {
  readonly code = "DOCUMENT_NOT_FOUND";
  constructor(documentId: string) {
    super(`Document not found: ${documentId}`);
  }
}

export class EmbeddingTransientError extends RagError {
  readonly code = "EMBEDDING_TRANSIENT";
  override readonly retryable = true;
  readonly status?: number;
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class EmbeddingPermanentError extends RagError {
  readonly code = "EMBEDDING_PERMANENT";
  readonly status?: number;
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class IndexingFailedError extends RagError {
  readonly code = "INDEXING_FAILED";
  readonly documentId: string;
  constructor(documentId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Indexing failed for ${documentId}: ${reason}`, { cause });
    this.documentId = documentId;
  }
}

export class IndexCorruptionError extends RagError {
  readonly code = "INDEX_CORRUPTION";
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Index store is unusable (${detail}); run a forced full reindex to rebuild it`, options);
  }
}

export class PageOutOfRangeError extends RagError {
  readonly code = "PAGE_OUT_OF_RANGE";
  readonly pageNumber: number;
  readonly pageCount: number;
  constructor(documentId: string, pageNumber: number, pageCount: number) {
    super(`Page ${pageNumber} is out of range for ${documentId} (1-${pageCount})`);
    this.pageNumber = pageNumber;
    this.pageCount = pageCount;
  }
}

export class GenerationError extends RagError {
  readonly code = "GENERATION_FAILED";
  override readonly retryable: boolean;
  readonly status?: number;
  constructor(message: string, retryable: boolean, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.retryable = retryable;
    this.status = status;
  }
}

export class ReindexInProgressError extends RagError {
  readonly code = "REINDEX_IN_PROGRESS";
  readonly httpStatus = 409;
  constructor(message = "A reindex pass is already in progress") {
    super(message);
  }
}

export class AbortError extends RagError {
  readonly code = "ABORTED";
  constructor(message = "aborted") {
    super(message);
  }
}

/** HTTP statuses worth another attempt. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
