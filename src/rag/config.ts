import path from "node:path";
import { z } from "zod";

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z
  .object({
    dataDir: z.string().min(1).default("data"),
    indexDir: z.string().min(1).default(".rag-cache/index"),

    chunkSize: positiveInt.default(1000),
    chunkOverlap: z.coerce.number().int().nonnegative().default(200),
    chunkingStrategy: z.string().min(1).default("page-chunker"),

    topK: positiveInt.default(3),
    minScore: z.coerce.number().min(-1).max(1).default(0.3),
    contextCharBudget: positiveInt.default(6000),

    apiBaseUrl: z.string().url().default("http://localhost:11434/v1"),
    apiKey: z.string().min(1).optional(),

    embeddingModel: z.string().min(1).default("all-minilm"),
    embeddingBatchSize: positiveInt.default(20),
    embeddingConcurrency: positiveInt.default(5),
    queryPrefix: z.string().default(""),

    generationModel: z.string().min(1).default("gemma3:12b"),
    targetLanguage: z.string().min(1).default("Traditional Chinese"),

    requestTimeoutMs: positiveInt.default(60_000),
    maxAttempts: positiveInt.default(4),
    retryBaseDelayMs: z.coerce.number().int().nonnegative().default(500),

    logLevel: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    logFilePath: z.string().min(1).optional(),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type RagConfig = Readonly<z.output<typeof ConfigSchema>>;
export type RagConfigInput = z.input<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const ENV_KEYS: Record<string, keyof RagConfigInput> = {
  RAG_DATA_DIR: "dataDir",
  RAG_INDEX_DIR: "indexDir",
  RAG_CHUNK_SIZE: "chunkSize",
  RAG_CHUNK_OVERLAP: "chunkOverlap",
  RAG_CHUNKING_STRATEGY: "chunkingStrategy",
  RAG_TOP_K: "topK",
  RAG_MIN_SCORE: "minScore",
  RAG_CONTEXT_CHARS: "contextCharBudget",
  RAG_API_BASE_URL: "apiBaseUrl",
  RAG_API_KEY: "apiKey",
  RAG_EMBEDDING_MODEL: "embeddingModel",
  RAG_EMBEDDING_BATCH_SIZE: "embeddingBatchSize",
  RAG_EMBEDDING_CONCURRENCY: "embeddingConcurrency",
  RAG_QUERY_PREFIX: "queryPrefix",
  RAG_GENERATION_MODEL: "generationModel",
  RAG_TARGET_LANGUAGE: "targetLanguage",
  RAG_REQUEST_TIMEOUT_MS: "requestTimeoutMs",
  RAG_MAX_ATTEMPTS: "maxAttempts",
  RAG_RETRY_BASE_DELAY_MS: "retryBaseDelayMs",
  LOG_LEVEL: "logLevel",
  LOG_FILE_PATH: "logFilePath",
};

/**
 * Builds the runtime configuration from environment variables, with
 * `overrides` taking precedence. Empty variables count as unset.
 */
export function loadRagConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RagConfigInput> = {},
): RagConfig {
  const raw: Record<string, unknown> = {};
  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") raw[field] = value;
  }
  // OpenRouter keys keep working without renaming the variable
  if (raw["apiKey"] === undefined && env["OPENROUTER_API_KEY"]) {
    raw["apiKey"] = env["OPENROUTER_API_KEY"];
  }

  const parsed = ConfigSchema.safeParse({ ...raw, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`),
    );
  }

  return Object.freeze({
    ...parsed.data,
    dataDir: path.resolve(parsed.data.dataDir),
    indexDir: path.resolve(parsed.data.indexDir),
    logFilePath: parsed.data.logFilePath ? path.resolve(parsed.data.logFilePath) : undefined,
  });
}

