import { renderPageAsImage } from "unpdf";
import { RAG_CONFIG } from "./config.js";
import { loadCanvas, type PdfDocument } from "./pdf-extractor.js";
import type { PageImage } from "./types.js";

/** Renders one page of an open PDF to PNG for OCR. */
export async function renderPdfPage(
  pdf: PdfDocument,
  pageNumber: number,
  scale: number = RAG_CONFIG.renderScale,
): Promise<PageImage> {
  const png = await renderPageAsImage(pdf, pageNumber, { canvas: loadCanvas, scale });
  return { bytes: new Uint8Array(png), mimeType: "image/png" };
}
