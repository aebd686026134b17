/**
 * Layout-aware PDF text extraction using pdfjs-dist.
 * Text items keep their page coordinates so rows can be rebuilt with column gaps
 * instead of being glued together.
 */

export interface TextItem {
  str: string;
  /** Left edge in PDF units */
  x: number;
  /** Baseline in PDF units (origin bottom-left) */
  y: number;
  width: number;
  page: number;
}

export interface PdfTextItems {
  items: TextItem[];
  totalPages: number;
}

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

export async function extractTextItems(buffer: Uint8Array): Promise<PdfTextItems> {
  // pdfjs-dist ships ESM only
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdfjs transfers the buffer it is given, so hand it a copy
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(buffer),
    useSystemFonts: true,
  });
  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      const contentItems: unknown[] = textContent.items;

      for (const item of contentItems) {
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const x = Number(item.transform[4]) || 0;
        const y = Number(item.transform[5]) || 0;
        const width = Number(item.width) || Math.abs(Number(item.transform[0]) || 1) * str.length * 0.6;

        items.push({ str, x, y, width, page: pageNum });
      }
    }
  } finally {
    await pdfDocument.destroy();
  }

  return { items, totalPages: pdfDocument.numPages };
}

const Y_TOLERANCE = 2.0;
const SPACE_GAP = 2.5;
const COLUMN_GAP = 18;

/**
 * Rebuild lines top to bottom. Items within Y_TOLERANCE share a row; a gap wider
 * than COLUMN_GAP becomes a tab, a gap wider than SPACE_GAP a space.
 */
export function buildLinesFromItems(items: readonly TextItem[]): string[] {
  if (items.length === 0) return [];

  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: { y: number; items: TextItem[] }[] = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    if (lastRow !== undefined && Math.abs(item.y - lastRow.y) <= Y_TOLERANCE) {
      lastRow.items.push(item);
    } else {
      rows.push({ y: item.y, items: [item] });
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.items.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row.items) {
      if (prevEndX !== null) {
        const gap = item.x - prevEndX;
        if (gap > COLUMN_GAP) {
          out += '\t';
        } else if (gap > SPACE_GAP) {
          out += ' ';
        }
      }
      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/[ \t]+$/g, '');
    if (cleaned.length > 0) {
      lines.push(cleaned);
    }
  }

  return lines;
}

export function buildLinesForPage(items: readonly TextItem[], pageNumber: number): string[] {
  return buildLinesFromItems(items.filter((item) => item.page === pageNumber));
}
