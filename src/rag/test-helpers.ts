import pino from "pino";
import type { RetryPolicy } from "./concurrency.js";
import { EmbeddingService } from "./embedding-service.js";
import { fingerprintBytes } from "./documents.js";
import { FetchError } from "./errors.js";
import {
  documentIdentity,
  type CallOptions,
  type Chunk,
  type DocumentRef,
  type DocumentSource,
  type EmbeddingProvider,
  type ExtractedText,
  type FetchedDocument,
  type GenerationProvider,
  type OcrEngine,
  type PageImage,
  type Prompt,
} from "./types.js";

export const silentLogger = pino({ level: "silent" });

export const NO_RETRY: RetryPolicy = { retries: 0, minTimeoutMs: 1, maxTimeoutMs: 1 };
export const FAST_RETRY: RetryPolicy = { retries: 2, minTimeoutMs: 1, maxTimeoutMs: 2 };

/** Embeds text through a lookup; unknown texts get `fallback`. */
export class FakeEmbedder implements EmbeddingProvider {
  readonly model = "fake-embedder";
  readonly calls: string[][] = [];
  failuresLeft = 0;

  constructor(
    private readonly lookup: (text: string) => number[] | undefined,
    private readonly fallback: number[] = [0, 0, 1],
  ) {}

  async embed(texts: string[], options?: CallOptions): Promise<number[][]> {
    options?.signal?.throwIfAborted();
    this.calls.push(texts);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("embedding backend unavailable");
    }
    return texts.map((text) => this.lookup(text) ?? this.fallback);
  }
}

export function embeddingService(provider: EmbeddingProvider, overrides: { batchSize?: number; queryPrefix?: string } = {}): EmbeddingService {
  return new EmbeddingService(provider, {
    batchSize: overrides.batchSize ?? 16,
    concurrency: 2,
    timeoutMs: 5_000,
    retry: NO_RETRY,
    queryPrefix: overrides.queryPrefix ?? "",
    logger: silentLogger,
  });
}

export class FakeGenerator implements GenerationProvider {
  readonly model = "fake-chat";
  readonly prompts: Prompt[] = [];

  constructor(private readonly reply: (prompt: Prompt) => Promise<string> | string = () => "An answer [1].") {}

  async generate(prompt: Prompt, options?: CallOptions): Promise<string> {
    options?.signal?.throwIfAborted();
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

/** Reads the image bytes back as UTF-8, so tests can encode the "printed" text directly. */
export class FakeOcr implements OcrEngine {
  calls = 0;

  constructor(private readonly recognizeText: (image: PageImage) => Promise<string> | string = decodeImageText) {}

  async recognize(image: PageImage, options?: CallOptions): Promise<string> {
    options?.signal?.throwIfAborted();
    this.calls++;
    return this.recognizeText(image);
  }
}

export function decodeImageText(image: PageImage): string {
  return new TextDecoder().decode(image.bytes.slice(8));
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** A PNG signature followed by the UTF-8 text a {@link FakeOcr} will "read". */
export function fakePng(text: string): Uint8Array {
  const body = new TextEncoder().encode(text);
  const bytes = new Uint8Array(PNG_SIGNATURE.length + body.length);
  bytes.set(PNG_SIGNATURE);
  bytes.set(body, PNG_SIGNATURE.length);
  return bytes;
}

export function fetched(libraryId: string, filePath: string, bytes: Uint8Array | string): FetchedDocument {
  const data = typeof bytes === "string" ? new TextEncoder().encode(bytes) : bytes;
  const ref: DocumentRef = { libraryId, path: filePath, name: filePath.split("/").pop() ?? filePath };
  return { ref, identity: documentIdentity(ref), fingerprint: fingerprintBytes(data), bytes: data };
}

export class InMemorySource implements DocumentSource {
  readonly files = new Map<string, Map<string, Uint8Array>>();
  fetchCount = 0;

  set(libraryId: string, filePath: string, content: Uint8Array | string): void {
    const library = this.files.get(libraryId) ?? new Map<string, Uint8Array>();
    library.set(filePath, typeof content === "string" ? new TextEncoder().encode(content) : content);
    this.files.set(libraryId, library);
  }

  delete(libraryId: string, filePath: string): void {
    this.files.get(libraryId)?.delete(filePath);
  }

  async listDocuments(libraryId: string): Promise<DocumentRef[]> {
    const library = this.files.get(libraryId);
    if (!library) throw new FetchError("not_found", libraryId, `No library ${libraryId}`);
    return [...library.keys()].sort().map((filePath) => ({
      libraryId,
      path: filePath,
      name: filePath.split("/").pop() ?? filePath,
    }));
  }

  async fetch(ref: DocumentRef): Promise<FetchedDocument> {
    this.fetchCount++;
    const bytes = this.files.get(ref.libraryId)?.get(ref.path);
    if (!bytes) throw new FetchError("not_found", documentIdentity(ref), `No document ${ref.path}`);
    return fetched(ref.libraryId, ref.path, bytes);
  }
}

export function extractedText(identity: string, pages: string[], fingerprint = "f".repeat(64)): ExtractedText {
  return {
    identity,
    fingerprint,
    source: identity.split(":").pop() ?? identity,
    pages,
    pageCount: pages.length,
    warnings: [],
    extractedAt: "2024-01-01T00:00:00.000Z",
  };
}

export function chunk(identity: string, index: number, text: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id: `${identity}#${index}`,
    identity,
    fingerprint: "f".repeat(64),
    source: identity.split(":").pop() ?? identity,
    index,
    pageStart: 1,
    pageEnd: 1,
    start: 0,
    end: text.length,
    text,
    ...overrides,
  };
}

function pdfString(text: string): string {
  return text.replace(/[\\()]/g, (c) => `\\${c}`);
}

/**
 * A minimal, valid PDF with one Letter-sized page per entry. A non-empty
 * entry is drawn as a Helvetica text run, so the page has a text layer; an
 * empty entry leaves the page blank, the way a scan without OCR looks.
 */
export function minimalPdf(pages: string[]): Uint8Array {
  const objects: string[] = [];
  const pageIds = pages.map((_, i) => 4 + i * 2);
  objects.push("<< /Type /Catalog /Pages 2 0 R >>");
  objects.push(`<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pages.length} >>`);
  objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>");
  for (const [i, text] of pages.entries()) {
    const stream = text ? `BT /F1 12 Tf 72 720 Td (${pdfString(text)}) Tj ET` : "";
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${5 + i * 2} 0 R >>`,
    );
    objects.push(`<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`);
  }

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(body);
}
