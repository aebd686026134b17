import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { PageImage } from '@stmtlens/orientation';
import { decodeJpegPage } from './jpeg-page.js';
import { renderPdfPages } from './pdf-render.js';
import { extractPdfText, type ExtractedPdfText } from './pdf-text.js';
import { decodePngPage } from './png-page.js';
import { hasSelectableText } from './text-source.js';

export type LoadedDocument =
  | { kind: 'text'; text: string; totalPages: number }
  | {
      kind: 'pages';
      pages: PageImage[];
      /** Set when a PDF's text layer could not be read and its pages were rendered instead */
      textError?: string | undefined;
    };

export const SUPPORTED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'] as const;

export interface PdfLoaders {
  extractText: (buffer: Uint8Array) => Promise<ExtractedPdfText>;
  renderPages: (buffer: Uint8Array) => Promise<PageImage[]>;
}

const PDF_LOADERS: PdfLoaders = {
  extractText: extractPdfText,
  renderPages: renderPdfPages,
};

/**
 * A PDF with enough selectable text is returned as text. Otherwise (no text
 * layer, too few words, or a text layer that fails to parse) its pages are
 * rendered for OCR.
 */
export async function loadPdfDocument(buffer: Uint8Array, loaders: PdfLoaders = PDF_LOADERS): Promise<LoadedDocument> {
  let textError: string | undefined;

  try {
    const extracted = await loaders.extractText(buffer);
    if (hasSelectableText(extracted.fullText)) {
      return { kind: 'text', text: extracted.fullText, totalPages: extracted.totalPages };
    }
  } catch (error) {
    textError = error instanceof Error ? error.message : String(error);
  }

  const pages = await loaders.renderPages(buffer);
  return { kind: 'pages', pages, textError };
}

/**
 * Load a statement file: PDFs through loadPdfDocument, images decoded as a
 * single page.
 */
export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  const extension = extname(filePath).toLowerCase();
  const read = async (): Promise<Uint8Array> => new Uint8Array(await readFile(filePath));

  switch (extension) {
    case '.pdf':
      return loadPdfDocument(await read());
    case '.png':
      return { kind: 'pages', pages: [decodePngPage(await read())] };
    case '.jpg':
    case '.jpeg':
      return { kind: 'pages', pages: [decodeJpegPage(await read())] };
    default:
      throw new Error(`Unsupported file type "${extension}" (expected ${SUPPORTED_EXTENSIONS.join(', ')})`);
  }
}
