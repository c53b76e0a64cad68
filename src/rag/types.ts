export interface DocumentRef {
  libraryId: string;
  /** Path of the document inside its library, `/`-separated. */
  path: string;
  name: string;
}

export interface FetchedDocument {
  ref: DocumentRef;
  identity: string;
  /** SHA-256 hex digest of `bytes`. */
  fingerprint: string;
  bytes: Uint8Array;
}

export interface PageImage {
  bytes: Uint8Array;
  mimeType: string;
}

export type PageContent =
  | { kind: "text"; text: string }
  | { kind: "image"; image: PageImage };

export interface PageSource {
  pageNumber: number;
  read(signal?: AbortSignal): Promise<PageContent>;
}

export interface ExtractionWarning {
  page: number;
  message: string;
}

export interface ExtractedText {
  identity: string;
  fingerprint: string;
  source: string;
  /** One entry per page in page order; `""` for pages that yielded nothing. */
  pages: string[];
  pageCount: number;
  warnings: ExtractionWarning[];
  extractedAt: string;
}

export interface Chunk {
  id: string;
  identity: string;
  fingerprint: string;
  source: string;
  index: number;
  pageStart: number;
  pageEnd: number;
  /** Offsets into the page texts joined by {@link PAGE_SEPARATOR}. */
  start: number;
  end: number;
  text: string;
}

export const PAGE_SEPARATOR = "\n\n";

export interface IndexedChunk {
  chunk: Chunk;
  vector: number[];
  norm: number;
  order: number;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface Citation {
  ref: number;
  chunkId: string;
  identity: string;
  source: string;
  pageStart: number;
  pageEnd: number;
  score: number;
}

export interface AnswerRecord {
  question: string;
  retrieved: Array<{ chunkId: string; identity: string; score: number }>;
  answer: string;
  citations: Citation[];
  createdAt: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface DocumentSource {
  listDocuments(libraryId: string, options?: CallOptions): Promise<DocumentRef[]>;
  fetch(ref: DocumentRef, options?: CallOptions): Promise<FetchedDocument>;
}

export interface OcrEngine {
  recognize(image: PageImage, options?: CallOptions): Promise<string>;
}

export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface Prompt {
  system: string;
  user: string;
}

export interface GenerationProvider {
  readonly model: string;
  generate(prompt: Prompt, options?: CallOptions): Promise<string>;
}

export function documentIdentity(ref: Pick<DocumentRef, "libraryId" | "path">): string {
  return `${ref.libraryId}:${ref.path}`;
}
