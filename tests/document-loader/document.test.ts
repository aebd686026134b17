import { describe, it, expect, vi } from 'vitest';
import { loadDocument, loadPdfDocument, type PdfLoaders } from '@stmtlens/document-loader';
import type { PageImage } from '@stmtlens/orientation';

const PAGE: PageImage = { width: 1, height: 1, data: new Uint8Array([255, 255, 255, 255]) };
const BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

function loaders(extractText: PdfLoaders['extractText']): PdfLoaders {
  return { extractText, renderPages: vi.fn(async () => [PAGE]) };
}

describe('loadPdfDocument', () => {
  it('should return selectable text without rendering', async () => {
    const text = 'Opening balance 42000 Closing balance 38500 Total credits 30000 Total debits 33500';
    const pdf = loaders(vi.fn(async () => ({ pages: [text], fullText: text, totalPages: 1 })));

    expect(await loadPdfDocument(BYTES, pdf)).toEqual({ kind: 'text', text, totalPages: 1 });
    expect(pdf.renderPages).not.toHaveBeenCalled();
  });

  it('should render pages when the text is too short', async () => {
    const pdf = loaders(vi.fn(async () => ({ pages: ['Page 1'], fullText: 'Page 1', totalPages: 1 })));

    expect(await loadPdfDocument(BYTES, pdf)).toEqual({ kind: 'pages', pages: [PAGE], textError: undefined });
    expect(pdf.renderPages).toHaveBeenCalledWith(BYTES);
  });

  it('should render pages when text extraction fails', async () => {
    const pdf = loaders(vi.fn(async () => Promise.reject(new Error('Invalid PDF structure'))));

    expect(await loadPdfDocument(BYTES, pdf)).toEqual({
      kind: 'pages',
      pages: [PAGE],
      textError: 'Invalid PDF structure',
    });
  });

  it('should reject when rendering fails too', async () => {
    const pdf: PdfLoaders = {
      extractText: vi.fn(async () => Promise.reject(new Error('bad xref'))),
      renderPages: vi.fn(async () => Promise.reject(new Error('bad xref'))),
    };

    await expect(loadPdfDocument(BYTES, pdf)).rejects.toThrow('bad xref');
  });
});

describe('loadDocument', () => {
  it('should reject unsupported extensions', async () => {
    await expect(loadDocument('statement.docx')).rejects.toThrow(
      'Unsupported file type ".docx" (expected .pdf, .png, .jpg, .jpeg)'
    );
  });
});
