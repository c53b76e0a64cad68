import type { Citation, Prompt, ScoredChunk } from "./types.js";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "I don't have enough information in the provided documents to answer that.";

export interface PackedContext {
  text: string;
  citations: Citation[];
}

export function pageLabel(pageStart: number, pageEnd: number): string {
  return pageStart === pageEnd ? `Page ${pageStart}` : `Pages ${pageStart}-${pageEnd}`;
}

function blockHeader(ref: number, scored: ScoredChunk): string {
  const { chunk } = scored;
  return `[${ref}] Source: ${chunk.source}, ${pageLabel(chunk.pageStart, chunk.pageEnd)}\n`;
}

const BLOCK_SEPARATOR = "\n\n";

/**
 * Packs chunks, best first, into at most `maxSize` characters. The first
 * chunk that does not fit ends the context, so lower-scored chunks are the
 * ones dropped. A top chunk too large for the budget on its own is cut down.
 */
export function packContext(chunks: ScoredChunk[], maxSize: number): PackedContext {
  const ordered = [...chunks].sort((a, b) => b.score - a.score);
  const blocks: string[] = [];
  const citations: Citation[] = [];
  let used = 0;

  for (const scored of ordered) {
    const ref = citations.length + 1;
    const header = blockHeader(ref, scored);
    const separator = blocks.length > 0 ? BLOCK_SEPARATOR.length : 0;
    let body = scored.chunk.text;

    if (used + separator + header.length + body.length > maxSize) {
      if (blocks.length > 0) break;
      const room = maxSize - header.length;
      if (room <= 0) break;
      body = body.slice(0, room).trimEnd();
      if (!body) break;
    }

    blocks.push(header + body);
    used += separator + header.length + body.length;
    citations.push({
      ref,
      chunkId: scored.chunk.id,
      identity: scored.chunk.identity,
      source: scored.chunk.source,
      pageStart: scored.chunk.pageStart,
      pageEnd: scored.chunk.pageEnd,
      score: scored.score,
    });
  }

  return { text: blocks.join(BLOCK_SEPARATOR), citations };
}

export function buildPrompt(question: string, context: string): Prompt {
  const system =
    "You answer questions using only the document excerpts supplied by the user. " +
    "Do not use outside knowledge and do not guess. " +
    "Cite the excerpts you rely on with their [n] labels. " +
    `If the excerpts do not contain the answer, reply exactly: "${INSUFFICIENT_CONTEXT_ANSWER}" ` +
    "If they answer only part of the question, say which part is missing.";

  const user =
    "--- Retrieved Context ---\n" +
    context +
    "\n--- End of Context ---\n\n" +
    `Question: ${question}`;

  return { system, user };
}

export interface SourceRef {
  source: string;
  pages: number[];
}

/** Groups citations by document, e.g. `manual.pdf p.1, p.3 | faq.png p.1`. */
export function formatSourcesForUI(citations: Citation[]): string {
  const sourceMap = new Map<string, Set<number>>();
  for (const citation of citations) {
    const pages = sourceMap.get(citation.source) ?? new Set<number>();
    for (let p = citation.pageStart; p <= citation.pageEnd; p++) pages.add(p);
    sourceMap.set(citation.source, pages);
  }

  const sources: SourceRef[] = [];
  for (const [source, pages] of sourceMap) {
    sources.push({ source, pages: [...pages].sort((a, b) => a - b) });
  }

  return sources
    .map((s) => `${s.source} ${s.pages.map((p) => `p.${p}`).join(", ")}`)
    .join(" | ");
}
