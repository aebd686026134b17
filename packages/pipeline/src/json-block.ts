import { InsightsSchema } from '@stmtlens/types';

/**
 * Cut the outermost JSON object out of free-form model output.
 */
export function extractJsonBlock(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || start > end) {
    throw new Error('No JSON object found in model output.');
  }
  return text.slice(start, end + 1);
}

function parseInsightArray(json: string): string[] {
  const parsed = InsightsSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new Error('Insights must be a JSON array of strings.');
  }
  return parsed.data;
}

/**
 * Model insights arrive as a JSON array of strings, possibly wrapped in prose.
 * Output without any array is kept as a single insight.
 */
export function parseInsights(raw: string): string[] {
  const text = raw.trim();
  if (text.startsWith('[')) {
    return parseInsightArray(text);
  }

  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start !== -1 && end > start) {
    return parseInsightArray(text.slice(start, end + 1));
  }

  return [text];
}
