import { createHash } from "node:crypto";
import path from "node:path";
import { RAG_CONFIG } from "./config.js";
import { ExtractionError, errorMessage } from "./errors.js";
import { openPdf, readPdfPageText, type PdfDocument } from "./pdf-extractor.js";
import { renderPdfPage } from "./page-renderer.js";
import type { FetchedDocument, PageContent, PageSource } from "./types.js";

export type DocumentFormat = "image" | "pdf" | "text";

const IMAGE_MIME_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".webp": "image/webp",
};

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".csv", ".html", ".xml"]);

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  ".pdf",
  ...Object.keys(IMAGE_MIME_BY_EXTENSION),
  ...TEXT_EXTENSIONS,
];

export function fingerprintBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

export function sniffMimeType(bytes: Uint8Array): string | null {
  if (startsWith(bytes, [0x25, 0x50, 0x44, 0x46, 0x2d])) return "application/pdf";
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "image/png";
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return "image/jpeg";
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return "image/gif";
  if (startsWith(bytes, [0x42, 0x4d])) return "image/bmp";
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) {
    return "image/tiff";
  }
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return "image/webp";
  }
  return null;
}

export function detectFormat(
  bytes: Uint8Array,
  fileName: string,
): { format: DocumentFormat; mimeType: string } | null {
  const sniffed = sniffMimeType(bytes);
  if (sniffed === "application/pdf") return { format: "pdf", mimeType: sniffed };
  if (sniffed) return { format: "image", mimeType: sniffed };

  const ext = path.extname(fileName).toLowerCase();
  if (ext === ".pdf") return { format: "pdf", mimeType: "application/pdf" };
  const imageMime = IMAGE_MIME_BY_EXTENSION[ext];
  if (imageMime) return { format: "image", mimeType: imageMime };
  if (TEXT_EXTENSIONS.has(ext)) return { format: "text", mimeType: "text/plain" };
  return null;
}

export function isSupportedFile(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

interface SourceDocumentBase {
  readonly document: FetchedDocument;
  extractPages(signal?: AbortSignal): Promise<PageSource[]>;
  /** Releases whatever `extractPages` opened. Safe to call more than once. */
  close(): Promise<void>;
}

export class ImageDocument implements SourceDocumentBase {
  readonly kind = "image";

  constructor(
    readonly document: FetchedDocument,
    readonly mimeType: string,
  ) {}

  async extractPages(signal?: AbortSignal): Promise<PageSource[]> {
    signal?.throwIfAborted();
    const image = { bytes: this.document.bytes, mimeType: this.mimeType };
    return [{ pageNumber: 1, read: async () => ({ kind: "image", image }) }];
  }

  async close(): Promise<void> {}
}

export class MultiPageDocument implements SourceDocumentBase {
  readonly kind = "pdf";
  private pdf: PdfDocument | null = null;

  constructor(
    readonly document: FetchedDocument,
    private readonly minTextLayerChars: number = RAG_CONFIG.minTextLayerChars,
  ) {}

  async extractPages(signal?: AbortSignal): Promise<PageSource[]> {
    signal?.throwIfAborted();
    const pdf = await openPdf(this.document.bytes).catch((error: unknown) => {
      throw new ExtractionError(
        "unreadable",
        this.document.identity,
        `Could not parse PDF ${this.document.ref.name}: ${errorMessage(error)}`,
        { cause: error },
      );
    });
    this.pdf = pdf;

    const pages: PageSource[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const pageNumber = i;
      pages.push({
        pageNumber,
        read: async (pageSignal): Promise<PageContent> => {
          pageSignal?.throwIfAborted();
          const text = await readPdfPageText(pdf, pageNumber);
          if (text.length >= this.minTextLayerChars) {
            return { kind: "text", text };
          }
          pageSignal?.throwIfAborted();
          return { kind: "image", image: await renderPdfPage(pdf, pageNumber) };
        },
      });
    }
    return pages;
  }

  async close(): Promise<void> {
    const pdf = this.pdf;
    this.pdf = null;
    await pdf?.destroy();
  }
}

export class TextDocument implements SourceDocumentBase {
  readonly kind = "text";

  constructor(readonly document: FetchedDocument) {}

  async extractPages(signal?: AbortSignal): Promise<PageSource[]> {
    signal?.throwIfAborted();
    const text = new TextDecoder("utf-8").decode(this.document.bytes);
    return [{ pageNumber: 1, read: async () => ({ kind: "text", text }) }];
  }

  async close(): Promise<void> {}
}

export type SourceDocument = ImageDocument | MultiPageDocument | TextDocument;

export function openDocument(
  document: FetchedDocument,
  options: { minTextLayerChars?: number } = {},
): SourceDocument {
  const detected = detectFormat(document.bytes, document.ref.name);
  if (!detected) {
    throw new ExtractionError(
      "unsupported_format",
      document.identity,
      `Unsupported document format: ${document.ref.name}`,
    );
  }

  switch (detected.format) {
    case "pdf":
      return new MultiPageDocument(document, options.minTextLayerChars);
    case "image":
      return new ImageDocument(document, detected.mimeType);
    case "text":
      return new TextDocument(document);
  }
}
