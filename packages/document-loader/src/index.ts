export {
  loadDocument,
  loadPdfDocument,
  SUPPORTED_EXTENSIONS,
  type LoadedDocument,
  type PdfLoaders,
} from './document.js';
export { extractPdfText, type ExtractedPdfText } from './pdf-text.js';
export { renderPdfPages, RENDER_DPI } from './pdf-render.js';
export {
  extractTextItems,
  buildLinesFromItems,
  buildLinesForPage,
  type TextItem,
  type PdfTextItems,
} from './pdf-layout.js';
export { countWords, hasSelectableText } from './text-source.js';
export { decodeJpegPage, encodeJpegPage } from './jpeg-page.js';
export { decodePngPage, encodePngPage } from './png-page.js';
export { readJpegOrientation } from './exif-orientation.js';
