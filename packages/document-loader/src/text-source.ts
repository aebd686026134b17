import { MIN_SELECTABLE_WORDS } from '@stmtlens/types';

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

/**
 * True when a PDF carries enough selectable text to skip OCR.
 */
export function hasSelectableText(text: string, minWords: number = MIN_SELECTABLE_WORDS): boolean {
  return countWords(text) > minWords;
}
