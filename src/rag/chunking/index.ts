import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { PageChunker } from "./page-chunker.js";

type ChunkingStrategyFactory = (options: ChunkingOptions) => ChunkingStrategy;

const registry = new Map<string, ChunkingStrategyFactory>();

export function registerChunkingStrategy(name: string, factory: ChunkingStrategyFactory): void {
  registry.set(name, factory);
}

export function getChunkingStrategy(name: string, options: ChunkingOptions): ChunkingStrategy {
  const factory = registry.get(name);
  if (!factory) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return factory(options);
}

// Register defaults
registerChunkingStrategy("page-chunker", (options) => new PageChunker(options));

export { PageChunker, chunkPageText, chunkId, type ChunkSpan } from "./page-chunker.js";
export type { ChunkingStrategy, ChunkingOptions } from "./types.js";
