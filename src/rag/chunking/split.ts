export interface Span {
  start: number;
  end: number;
}

const SEPARATORS = ["\n\n", "\n", " "];

function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function skipSpace(text: string, from: number): number {
  let i = from;
  while (i < text.length && isSpace(text[i])) i++;
  return i;
}

export function effectiveOverlap(maxSize: number, overlap: number): number {
  return Math.min(Math.max(0, Math.floor(overlap)), Math.floor(maxSize / 2));
}

export function assertChunkSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
  }
}

/**
 * Splits text into spans of at most `maxSize` characters, preferring to break
 * on \n\n, then \n, then a space, then a hard cut. Consecutive spans share up
 * to `overlap` characters (capped at half of maxSize), with the shared part
 * starting on a word boundary. Span starts strictly increase.
 */
export function splitWithOverlap(text: string, maxSize: number, overlap: number): Span[] {
  assertChunkSize(maxSize);
  const shared = effectiveOverlap(maxSize, overlap);
  const spans: Span[] = [];

  let start = skipSpace(text, 0);
  while (start < text.length) {
    let end = text.length;
    if (text.length - start > maxSize) {
      end = start + maxSize;
      for (const sep of SEPARATORS) {
        const idx = text.lastIndexOf(sep, start + maxSize - sep.length);
        if (idx > start + shared) {
          end = idx;
          break;
        }
      }
    }

    let trimmedEnd = end;
    while (trimmedEnd > start && isSpace(text[trimmedEnd - 1])) trimmedEnd--;
    if (trimmedEnd > start) spans.push({ start, end: trimmedEnd });

    if (text.slice(end).trim() === "") break;

    let next = trimmedEnd - shared;
    if (shared > 0 && next > 0 && !isSpace(text[next - 1])) {
      let boundary = next;
      while (boundary <= trimmedEnd && !isSpace(text[boundary])) boundary++;
      if (boundary <= trimmedEnd) next = boundary + 1;
    }
    start = skipSpace(text, Math.max(next, start + 1));
  }

  return spans;
}

/** Start offset of every page inside `pages.join(separator)`. */
export function pageOffsets(pages: readonly string[], separator: string): number[] {
  const offsets: number[] = [];
  let offset = 0;
  for (const page of pages) {
    offsets.push(offset);
    offset += page.length + separator.length;
  }
  return offsets;
}

export function chunkId(identity: string, fingerprint: string, index: number): string {
  return `${identity}@${fingerprint.slice(0, 12)}#${index}`;
}
