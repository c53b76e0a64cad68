import type { ChunkingStrategy } from "./types.js";
import { PageChunker } from "./page-chunker.js";
import { DocumentChunker } from "./document-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new PageChunker());
registerChunkingStrategy(new DocumentChunker());

export { PageChunker } from "./page-chunker.js";
export { DocumentChunker } from "./document-chunker.js";
export { splitWithOverlap, effectiveOverlap } from "./split.js";
export type { ChunkingStrategy } from "./types.js";
