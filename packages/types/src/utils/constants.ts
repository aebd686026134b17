export const ANALYZER_VERSION = '0.3.0';

/** Absolute tolerance, in currency units, for opening + credits - debits vs. closing. */
export const BALANCE_TOLERANCE = 1.0;

/** A PDF with more words than this is read as text instead of going to OCR. */
export const MIN_SELECTABLE_WORDS = 10;

export const PAGE_BREAK = '\n\n---PAGE_BREAK---\n\n';

export const ACCOUNT_NUMBER_VISIBLE_DIGITS = 4;

export const TEXT_SOURCES = {
  PDF: 'PDF Extracted Text',
  OCR: 'OCR (Gemini Vision)',
  SAMPLE: 'Sample Data',
  JSON: 'Extracted JSON',
} as const;

export type TextSource = typeof TEXT_SOURCES[keyof typeof TEXT_SOURCES];
