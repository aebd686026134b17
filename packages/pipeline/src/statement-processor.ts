/**
 * Statement pipeline: text (or OCR of corrected pages) -> model extraction ->
 * deterministic checks -> model insights.
 *
 * Page and insight failures degrade the result; only a failed extraction
 * ends processing, and it is reported as an error object rather than thrown.
 */

import { computeAverageDailyBalance, countDuplicates, validateBalances } from '@stmtlens/analytics';
import { OrientationResolver, type PageImage } from '@stmtlens/orientation';
import {
  ModelExtractionSchema,
  PAGE_BREAK,
  TEXT_SOURCES,
  maskAccountNumber,
  type ExtractedStatement,
  type PageMeta,
  type StatementResult,
  type TextSource,
} from '@stmtlens/types';
import { extractJsonBlock, parseInsights } from './json-block.js';
import type { StatementModel } from './model.js';
import { withRetry, type RetryOptions } from './retry.js';

export type StatementInput =
  | { kind: 'text'; text: string }
  | { kind: 'pages'; pages: PageImage[] }
  | { kind: 'extracted'; statement: unknown };

export interface ProcessorOptions {
  /** Without a model only already-extracted input can be processed, and no insights are generated */
  model?: StatementModel | undefined;
  orientation?: OrientationResolver | undefined;
  retry?: RetryOptions | undefined;
}

export interface ProcessingError {
  error: string;
}

export type ProcessingOutcome = StatementResult | ProcessingError;

export interface FinalizedStatement {
  statement: ExtractedStatement;
  warnings: string[];
}

export function isProcessingError(outcome: ProcessingOutcome): outcome is ProcessingError {
  return 'error' in outcome;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Correct each page's orientation and transcribe it. A failed page keeps its
 * slot as empty text and records the error in its metadata.
 */
export async function transcribePages(
  pages: readonly PageImage[],
  model: StatementModel,
  resolver: OrientationResolver = new OrientationResolver()
): Promise<{ text: string; pages: PageMeta[] }> {
  const texts: string[] = [];
  const meta: PageMeta[] = [];

  for (const [index, image] of pages.entries()) {
    const page = index + 1;
    try {
      const { image: upright, angle } = await resolver.resolve(image);
      const text = await model.transcribePage(upright);
      texts.push(text.trim());
      meta.push({ page, source: model.name, rotationApplied: angle !== 0, angle });
    } catch (error) {
      texts.push('');
      meta.push({ page, error: errorMessage(error) });
    }
  }

  return { text: texts.join(PAGE_BREAK), pages: meta };
}

/**
 * Validate an extraction payload (already parsed JSON). Multi-account payloads
 * are reduced to their first account.
 */
export function parseExtraction(payload: unknown): ExtractedStatement {
  const parsed = ModelExtractionSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Model output does not match the statement schema: ${issues}`);
  }
  return parsed.data;
}

export function parseExtractionText(raw: string): ExtractedStatement {
  const payload: unknown = JSON.parse(extractJsonBlock(raw));
  return parseExtraction(payload);
}

function isUsableAmount(value: number | string | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Fill in the average daily balance when the statement does not state one,
 * mask the account number and collect balance and duplicate warnings.
 */
export function finalizeStatement(extracted: ExtractedStatement): FinalizedStatement {
  const summary = { ...extracted.summary };
  const transactions = extracted.transactions;

  // a stated value is kept only when it is a non-zero number
  if (!isUsableAmount(summary.average_daily_balance) || summary.average_daily_balance === 0) {
    const opening = isUsableAmount(summary.opening_balance) ? summary.opening_balance : 0;
    summary.average_daily_balance = computeAverageDailyBalance(transactions, opening);
  }

  const fields = {
    ...extracted.fields,
    account_number_masked: maskAccountNumber(extracted.fields.account_number_masked),
  };

  const warnings = validateBalances(summary);
  const duplicates = countDuplicates(transactions);
  if (duplicates > 0) {
    warnings.push(`Duplicate entries detected: ${duplicates} duplicates found.`);
  }

  return { statement: { fields, summary, transactions }, warnings };
}

async function obtainText(
  input: Exclude<StatementInput, { kind: 'extracted' }>,
  model: StatementModel,
  resolver: OrientationResolver | undefined
): Promise<{ text: string; pages: PageMeta[]; textSource: TextSource }> {
  if (input.kind === 'text') {
    return {
      text: input.text,
      pages: [{ page: 1, source: 'PDF text', rotationApplied: false }],
      textSource: TEXT_SOURCES.PDF,
    };
  }
  const { text, pages } = await transcribePages(input.pages, model, resolver);
  return { text, pages, textSource: TEXT_SOURCES.OCR };
}

export async function processStatement(
  input: StatementInput,
  options: ProcessorOptions
): Promise<ProcessingOutcome> {
  const { model } = options;

  let extracted: ExtractedStatement;
  let pages: PageMeta[] = [];
  let textSource: TextSource = TEXT_SOURCES.JSON;

  try {
    if (input.kind === 'extracted') {
      extracted = parseExtraction(input.statement);
    } else {
      if (model === undefined) {
        throw new Error('no model configured');
      }
      const source = await obtainText(input, model, options.orientation);
      pages = source.pages;
      textSource = source.textSource;
      extracted = await withRetry(
        async () => parseExtractionText(await model.extractStatement(source.text)),
        options.retry
      );
    }
  } catch (error) {
    return { error: `Extraction failed: ${errorMessage(error)}` };
  }

  const { statement, warnings } = finalizeStatement(extracted);

  let insights: string[] = [];
  if (model !== undefined) {
    try {
      insights = await withRetry(
        async () => parseInsights(await model.generateInsights(JSON.stringify(statement, null, 2))),
        options.retry
      );
    } catch (error) {
      insights = [`Insight generation failed: ${errorMessage(error)}`];
    }
  }

  return {
    fields: statement,
    insights,
    quality: { pages, warnings, textSource },
  };
}
