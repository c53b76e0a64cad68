import type { Logger } from "pino";
import { moduleLogger } from "../utils/logger.js";
import { callSignal, withRetry, type LimitFunction, type RetryPolicy } from "./concurrency.js";
import { openDocument, type SourceDocument } from "./documents.js";
import { ExtractionError, errorMessage } from "./errors.js";
import type { ExtractionCache } from "./extraction-cache.js";
import type { ExtractedText, ExtractionWarning, FetchedDocument, OcrEngine, PageSource } from "./types.js";

export interface TextExtractorOptions {
  ocr: OcrEngine;
  cache: ExtractionCache;
  pool: LimitFunction;
  retry: RetryPolicy;
  ocrTimeoutMs: number;
  minTextLayerChars?: number;
  logger?: Logger;
  now?: () => Date;
}

type PageOutcome = { ok: true; text: string } | { ok: false; message: string };

export function normalizeOcrText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t\f\v]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export class TextExtractor {
  private readonly logger: Logger;

  constructor(private readonly options: TextExtractorOptions) {
    this.logger = moduleLogger("extract", options.logger);
  }

  /**
   * Text of every page of the document, from the cache when this fingerprint
   * has been extracted before. A page that cannot be read becomes `""` with a
   * warning; the document only fails when nothing could be read at all.
   */
  async extract(document: FetchedDocument, options: { signal?: AbortSignal } = {}): Promise<ExtractedText> {
    const { cache } = this.options;
    cache.markCurrent(document.identity, document.fingerprint);
    return cache.getOrCompute(
      document.identity,
      document.fingerprint,
      (signal) => this.compute(document, signal),
      options.signal,
    );
  }

  private async compute(document: FetchedDocument, signal: AbortSignal): Promise<ExtractedText> {
    const source = openDocument(document, { minTextLayerChars: this.options.minTextLayerChars });
    const fileLogger = this.logger.child({ file: document.ref.name });

    try {
      return await this.readPages(source, document, signal, fileLogger);
    } finally {
      await source.close().catch((error: unknown) => {
        fileLogger.warn({ error: errorMessage(error) }, "Could not release the document.");
      });
    }
  }

  private async readPages(
    source: SourceDocument,
    document: FetchedDocument,
    signal: AbortSignal,
    fileLogger: Logger,
  ): Promise<ExtractedText> {
    const pages = await source.extractPages(signal).catch((error: unknown) => {
      signal.throwIfAborted();
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError("unreadable", document.identity, `Could not read ${document.ref.name}: ${errorMessage(error)}`, {
        cause: error,
      });
    });

    fileLogger.info(`Extracting ${pages.length} page${pages.length === 1 ? "" : "s"} (${source.kind}).`);

    const outcomes = await Promise.all(
      pages.map((page) => this.options.pool(() => this.readPage(page, signal))),
    );
    signal.throwIfAborted();

    const warnings: ExtractionWarning[] = [];
    const texts = outcomes.map((outcome, i) => {
      const pageNumber = pages[i]?.pageNumber ?? i + 1;
      if (outcome.ok) return outcome.text;
      warnings.push({ page: pageNumber, message: `page ${pageNumber} failed: ${outcome.message}` });
      fileLogger.warn({ page: pageNumber, error: outcome.message }, "Page extraction failed.");
      return "";
    });

    if (pages.length > 0 && warnings.length === pages.length) {
      throw new ExtractionError(
        "engine_failure",
        document.identity,
        `No page of ${document.ref.name} could be read: ${warnings[0]?.message ?? "unknown error"}`,
      );
    }

    return {
      identity: document.identity,
      fingerprint: document.fingerprint,
      source: document.ref.name,
      pages: texts,
      pageCount: pages.length,
      warnings,
      extractedAt: (this.options.now?.() ?? new Date()).toISOString(),
    };
  }

  private async readPage(page: PageSource, signal: AbortSignal): Promise<PageOutcome> {
    signal.throwIfAborted();
    try {
      const content = await page.read(signal);
      if (content.kind === "text") {
        return { ok: true, text: normalizeOcrText(content.text) };
      }

      const text = await withRetry(
        () => this.options.ocr.recognize(content.image, { signal: callSignal(this.options.ocrTimeoutMs, signal) }),
        {
          ...this.options.retry,
          label: `ocr:page-${page.pageNumber}`,
          signal,
          logger: this.logger,
        },
      );
      return { ok: true, text: normalizeOcrText(text) };
    } catch (error) {
      signal.throwIfAborted();
      return { ok: false, message: errorMessage(error) };
    }
  }
}
