import { readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';

export interface PromptTemplates {
  extraction: string;
  insights: string;
  pageOcr: string;
}

export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL('../prompts/', import.meta.url));

const PROMPT_FILES: Record<keyof PromptTemplates, string> = {
  extraction: 'extraction.txt',
  insights: 'insights.txt',
  pageOcr: 'page-ocr.txt',
};

export async function loadPromptTemplates(dir: string = DEFAULT_PROMPTS_DIR): Promise<PromptTemplates> {
  const [extraction, insights, pageOcr] = await Promise.all([
    readFile(join(dir, PROMPT_FILES.extraction), 'utf-8'),
    readFile(join(dir, PROMPT_FILES.insights), 'utf-8'),
    readFile(join(dir, PROMPT_FILES.pageOcr), 'utf-8'),
  ]);
  return { extraction, insights, pageOcr: pageOcr.trim() };
}

/**
 * Replace every `{{NAME}}` placeholder. Unknown placeholders are left in place.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}
