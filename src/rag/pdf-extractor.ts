import { createIsomorphicCanvasFactory, getDocumentProxy } from "unpdf";

export type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

export const loadCanvas = () => import("@napi-rs/canvas");

/**
 * Opens a PDF with a node canvas factory, so the same proxy can both read
 * text layers and render pages. pdf.js detaches the buffer it is given.
 */
export async function openPdf(bytes: Uint8Array): Promise<PdfDocument> {
  const canvasFactory = await createIsomorphicCanvasFactory(loadCanvas);
  return getDocumentProxy(new Uint8Array(bytes), { canvasFactory });
}

/** Text layer of one page, items joined the way pdf.js lays them out. */
export async function readPdfPageText(pdf: PdfDocument, pageNumber: number): Promise<string> {
  const page = await pdf.getPage(pageNumber);
  const textContent = await page.getTextContent();
  return textContent.items
    .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
    .join("")
    .trim();
}
