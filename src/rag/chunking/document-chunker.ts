import { PAGE_SEPARATOR, type Chunk, type ExtractedText } from "../types.js";
import { chunkId, pageOffsets, splitWithOverlap } from "./split.js";
import type { ChunkingStrategy } from "./types.js";

function pageAt(offsets: readonly number[], offset: number): number {
  let page = 1;
  offsets.forEach((start, i) => {
    if (start <= offset) page = i + 1;
  });
  return page;
}

/**
 * Treats the document as one flow of text so passages can run across page
 * breaks; `pageStart`/`pageEnd` record the pages a chunk touches.
 */
export class DocumentChunker implements ChunkingStrategy {
  readonly name = "document-chunker";

  chunk(text: ExtractedText, maxSize: number, overlap: number): Chunk[] {
    const joined = text.pages.join(PAGE_SEPARATOR);
    const offsets = pageOffsets(text.pages, PAGE_SEPARATOR);

    return splitWithOverlap(joined, maxSize, overlap).map((span, index) => ({
      id: chunkId(text.identity, text.fingerprint, index),
      identity: text.identity,
      fingerprint: text.fingerprint,
      source: text.source,
      index,
      pageStart: pageAt(offsets, span.start),
      pageEnd: pageAt(offsets, span.end - 1),
      start: span.start,
      end: span.end,
      text: joined.slice(span.start, span.end),
    }));
  }
}
