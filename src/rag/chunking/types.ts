import type { Chunk, ExtractedText } from "../types.js";

export interface ChunkingStrategy {
  readonly name: string;
  chunk(text: ExtractedText, maxSize: number, overlap: number): Chunk[];
}
