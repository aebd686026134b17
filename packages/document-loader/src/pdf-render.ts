import { createCanvas } from '@napi-rs/canvas';
import type { PageImage } from '@stmtlens/orientation';

/** Scanned pages are rasterized at 300 dpi for OCR. */
export const RENDER_DPI = 300;

const PDF_POINTS_PER_INCH = 72;

/**
 * Render every page of a PDF to an RGBA page image on a white background.
 */
export async function renderPdfPages(buffer: Uint8Array, dpi: number = RENDER_DPI): Promise<PageImage[]> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(buffer),
    useSystemFonts: true,
  });
  const pdfDocument = await loadingTask.promise;
  const pages: PageImage[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const viewport = page.getViewport({ scale: dpi / PDF_POINTS_PER_INCH });
      const width = Math.ceil(viewport.width);
      const height = Math.ceil(viewport.height);

      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');
      context.fillStyle = '#ffffff';
      context.fillRect(0, 0, width, height);

      await page.render({ canvasContext: context, viewport }).promise;

      const { data } = context.getImageData(0, 0, width, height);
      pages.push({ width, height, data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength) });
      page.cleanup();
    }
  } finally {
    await pdfDocument.destroy();
  }

  return pages;
}
