import { PAGE_SEPARATOR, type Chunk, type ExtractedText } from "../types.js";
import { chunkId, pageOffsets, splitWithOverlap } from "./split.js";
import type { ChunkingStrategy } from "./types.js";

/** Chunks each page on its own; a chunk never spans two pages. */
export class PageChunker implements ChunkingStrategy {
  readonly name = "page-chunker";

  chunk(text: ExtractedText, maxSize: number, overlap: number): Chunk[] {
    const chunks: Chunk[] = [];
    const offsets = pageOffsets(text.pages, PAGE_SEPARATOR);

    text.pages.forEach((pageText, i) => {
      if (!pageText.trim()) return;
      const base = offsets[i] ?? 0;
      const pageNumber = i + 1;

      for (const span of splitWithOverlap(pageText, maxSize, overlap)) {
        const index = chunks.length;
        chunks.push({
          id: chunkId(text.identity, text.fingerprint, index),
          identity: text.identity,
          fingerprint: text.fingerprint,
          source: text.source,
          index,
          pageStart: pageNumber,
          pageEnd: pageNumber,
          start: base + span.start,
          end: base + span.end,
          text: pageText.slice(span.start, span.end),
        });
      }
    });

    return chunks;
  }
}
