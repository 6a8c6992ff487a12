import * as pdfjsLib from "pdfjs-dist";
import type { PDFDocumentProxy, PDFPageProxy } from "pdfjs-dist";
import type { RasterImage } from "../model/types";
import { rasterFromCanvas, type RasterSource } from "./RasterSource";

// Worker 설정
if (typeof window !== "undefined" && !pdfjsLib.GlobalWorkerOptions.workerSrc) {
  pdfjsLib.GlobalWorkerOptions.workerSrc = `/pdf.worker.min.mjs`;
}

/** Renders one page at `scale` (1 = 72 dpi) into an RGBA raster. */
export async function rasterFromPdfPage(page: PDFPageProxy, scale = 2): Promise<RasterImage> {
  const viewport = page.getViewport({ scale });
  const canvas = document.createElement("canvas");
  canvas.width = Math.max(1, Math.floor(viewport.width));
  canvas.height = Math.max(1, Math.floor(viewport.height));
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("2D canvas context unavailable");
  await page.render({ canvasContext: ctx, canvas, viewport }).promise;
  return rasterFromCanvas(canvas);
}

export class PdfPageRasterSource implements RasterSource {
  constructor(
    private document: PDFDocumentProxy,
    private pageNumber: number,
    private scale = 2
  ) {}

  async load(): Promise<RasterImage> {
    if (this.pageNumber < 1 || this.pageNumber > this.document.numPages) {
      throw new Error(`Page ${this.pageNumber} out of range (1..${this.document.numPages})`);
    }
    const page = await this.document.getPage(this.pageNumber);
    try {
      return await rasterFromPdfPage(page, this.scale);
    } finally {
      page.cleanup();
    }
  }
}

export async function openPdfDocument(source: string | Uint8Array): Promise<PDFDocumentProxy> {
  const task = typeof source === "string" ? pdfjsLib.getDocument({ url: source }) : pdfjsLib.getDocument({ data: source });
  return await task.promise;
}
