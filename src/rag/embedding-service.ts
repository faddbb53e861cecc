import type { Logger } from "pino";
import { z } from "zod";
import {
  AbortError,
  EmbeddingPermanentError,
  EmbeddingTransientError,
  RagError,
  errorMessage,
  isTransientStatus,
} from "./errors.js";
import { TimeoutError, runWithRetry, withTimeout, type RetryPolicy } from "./retry.js";

/** One vector per input string, in input order. */
export interface EmbeddingGateway {
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative().optional(),
    }),
  ),
});

export interface HttpEmbeddingGatewayOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/** OpenAI-compatible `/embeddings` endpoint (Ollama `/v1`, OpenRouter, ...). */
export class HttpEmbeddingGateway implements EmbeddingGateway {
  readonly model: string;
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpEmbeddingGatewayOptions) {
    this.model = options.model;
    this.url = `${options.baseUrl.replace(/\/+$/, "")}/embeddings`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      return await withTimeout(this.timeoutMs, signal, (requestSignal) =>
        this.request(texts, requestSignal),
      );
    } catch (err) {
      if (err instanceof RagError) throw err;
      if (err instanceof TimeoutError) {
        throw new EmbeddingTransientError(`Embedding request ${err.message}`, undefined, { cause: err });
      }
      // fetch rejects with a TypeError on connection failures
      throw new EmbeddingTransientError(`Embedding request failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }
  }

  private async request(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;

    const res = await this.fetchImpl(this.url, {
      method: "POST",
      headers,
      body: JSON.stringify({ model: this.model, input: texts }),
      signal,
    });

    if (!res.ok) {
      const text = await res.text();
      const message = `Embedding API error (${res.status}): ${text}`;
      throw isTransientStatus(res.status)
        ? new EmbeddingTransientError(message, res.status)
        : new EmbeddingPermanentError(message, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new EmbeddingPermanentError("Embedding API returned invalid JSON", res.status, { cause: err });
    }
    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingPermanentError("Embedding API response has an unexpected shape", res.status, {
        cause: parsed.error,
      });
    }

    const items = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    if (items.length !== texts.length) {
      throw new EmbeddingPermanentError(
        `Embedding API returned ${items.length} vectors for ${texts.length} inputs`,
        res.status,
      );
    }
    const vectors = items.map((item) => item.embedding);
    const dimension = vectors[0]?.length ?? 0;
    if (dimension === 0 || vectors.some((v) => v.length !== dimension)) {
      throw new EmbeddingPermanentError("Embedding API returned vectors of inconsistent dimension", res.status);
    }
    return vectors;
  }
}

export interface EmbedOptions {
  batchSize: number;
  concurrency: number;
  retry: RetryPolicy;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onProgress?: (done: number, total: number) => void;
}

function isTransientEmbeddingError(err: unknown): boolean {
  return err instanceof EmbeddingTransientError;
}

async function embedBatchWithRetry(
  gateway: EmbeddingGateway,
  batch: string[],
  options: EmbedOptions,
): Promise<number[][]> {
  return runWithRetry({
    runStep: () => gateway.embed(batch, options.signal),
    isRetryableError: isTransientEmbeddingError,
    maxAttempts: options.retry.maxAttempts,
    baseDelayMs: options.retry.baseDelayMs,
    signal: options.signal,
    sleep: options.sleep,
    onRetry: ({ attempt, maxAttempts, error, delayMs }) => {
      options.logger?.warn(
        { attempt, maxAttempts, delayMs, err: errorMessage(error) },
        "embedding batch failed, retrying",
      );
    },
  });
}

/**
 * Embeds `texts` in batches with bounded concurrency. The abort signal is
 * honoured between batches; the first failure stops the remaining workers.
 */
export async function embedTexts(
  gateway: EmbeddingGateway,
  texts: string[],
  options: EmbedOptions,
): Promise<number[][]> {
  // Split into batches
  const batches: { texts: string[]; startIdx: number }[] = [];
  for (let i = 0; i < texts.length; i += options.batchSize) {
    batches.push({
      texts: texts.slice(i, i + options.batchSize),
      startIdx: i,
    });
  }

  const results: number[][] = new Array<number[]>(texts.length);
  let completed = 0;
  let stopped = false;

  const queue = [...batches];
  const workers = Array.from(
    { length: Math.min(options.concurrency, queue.length) },
    async () => {
      while (!stopped) {
        const batch = queue.shift();
        if (!batch) break;
        if (options.signal?.aborted) {
          stopped = true;
          throw new AbortError();
        }
        let embeddings: number[][];
        try {
          embeddings = await embedBatchWithRetry(gateway, batch.texts, options);
        } catch (err) {
          stopped = true;
          throw err;
        }
        if (embeddings.length !== batch.texts.length) {
          stopped = true;
          throw new EmbeddingPermanentError(
            `Expected ${batch.texts.length} vectors, got ${embeddings.length}`,
          );
        }
        embeddings.forEach((vector, j) => {
          results[batch.startIdx + j] = vector;
        });
        completed += batch.texts.length;
        options.onProgress?.(Math.min(completed, texts.length), texts.length);
      }
    },
  );

  await Promise.all(workers);
  return results;
}

export async function embedQuery(
  gateway: EmbeddingGateway,
  query: string,
  options: Omit<EmbedOptions, "batchSize" | "concurrency" | "onProgress"> & { prefix: string },
): Promise<number[]> {
  const [embedding] = await embedBatchWithRetry(gateway, [options.prefix + query], {
    ...options,
    batchSize: 1,
    concurrency: 1,
  });
  if (!embedding) throw new EmbeddingPermanentError("Embedding API returned no vector for the query");
  return embedding;
}
