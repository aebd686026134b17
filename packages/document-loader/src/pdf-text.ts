import { buildLinesForPage, extractTextItems } from './pdf-layout.js';

export interface ExtractedPdfText {
  pages: string[];
  fullText: string;
  totalPages: number;
}

export async function extractPdfText(buffer: Uint8Array): Promise<ExtractedPdfText> {
  const { items, totalPages } = await extractTextItems(buffer);

  const pages: string[] = [];
  for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
    pages.push(buildLinesForPage(items, pageNum).join('\n'));
  }

  return {
    pages,
    fullText: pages.join('\n\n').trim(),
    totalPages,
  };
}
