import { z } from 'zod';
import { parseAmount } from '../utils/money.js';

/**
 * Model output often carries amounts as formatted strings ("1,234.50").
 * Strings that do not parse are returned unchanged for the field to decide.
 */
const coerceAmount = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  if (value.trim() === '') return null;
  try {
    return parseAmount(value);
  } catch {
    return value;
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Summary money keeps values that do not parse as strings, so the balance
 * check can report them instead of the whole extraction failing.
 */
const summaryAmount = (value: unknown): unknown => {
  const coerced = coerceAmount(value);
  if (coerced === null || coerced === undefined || typeof coerced === 'number' || typeof coerced === 'string') {
    return coerced;
  }
  return JSON.stringify(coerced);
};

/** Transaction money that does not parse to a finite number becomes null. */
const transactionAmount = (value: unknown): unknown => {
  const coerced = coerceAmount(value);
  if (coerced === null || coerced === undefined) return coerced;
  return typeof coerced === 'number' && Number.isFinite(coerced) ? coerced : null;
};

const count = (value: unknown): unknown => {
  const coerced = coerceAmount(value);
  if (coerced === null || coerced === undefined) return coerced;
  return typeof coerced === 'number' && Number.isInteger(coerced) && coerced >= 0 ? coerced : null;
};

const text = (value: unknown): unknown => {
  if (value === null || value === undefined || typeof value === 'string') return value;
  return typeof value === 'number' ? String(value) : null;
};

const SummaryMoneySchema = z.preprocess(summaryAmount, z.union([z.number(), z.string()]).nullable().optional());

const OptionalMoneySchema = z.preprocess(transactionAmount, z.number().nullable().optional());

const OptionalCountSchema = z.preprocess(count, z.number().int().nonnegative().nullable().optional());

const OptionalTextSchema = z.preprocess(text, z.string().nullable().optional());

export const TransactionSchema = z.object({
  date: OptionalTextSchema,
  description: OptionalTextSchema,
  amount: OptionalMoneySchema,
  balance: OptionalMoneySchema,
  category: OptionalTextSchema,
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const SummarySchema = z.object({
  opening_balance: SummaryMoneySchema,
  closing_balance: SummaryMoneySchema,
  total_credits: SummaryMoneySchema,
  total_debits: SummaryMoneySchema,
  average_daily_balance: SummaryMoneySchema,
  overdraft_count: OptionalCountSchema,
  nsf_count: OptionalCountSchema,
});
export type Summary = z.infer<typeof SummarySchema>;

export const StatementFieldsSchema = z.object({
  bank_name: OptionalTextSchema,
  account_holder_name: OptionalTextSchema,
  account_number_masked: OptionalTextSchema,
  statement_month: OptionalTextSchema,
  account_type: OptionalTextSchema,
  currency: OptionalTextSchema,
});
export type StatementFields = z.infer<typeof StatementFieldsSchema>;

export const ExtractedStatementSchema = z.object({
  fields: StatementFieldsSchema.default({}),
  summary: SummarySchema.default({}),
  // entries that are not objects are dropped rather than failing the statement
  transactions: z
    .preprocess((value) => (Array.isArray(value) ? value.filter(isRecord) : value), z.array(TransactionSchema))
    .default([]),
});
export type ExtractedStatement = z.infer<typeof ExtractedStatementSchema>;

const firstAccount = (value: unknown): unknown => {
  if (isRecord(value)) {
    const accounts = value['accounts'];
    if (Array.isArray(accounts)) return accounts[0];
  }
  return value;
};

/**
 * Multi-account responses are reduced to their first account.
 */
export const ModelExtractionSchema = z.preprocess(firstAccount, ExtractedStatementSchema);

export const OrientationAngleSchema = z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]);
export type OrientationAngle = z.infer<typeof OrientationAngleSchema>;

export const PageMetaSchema = z.object({
  page: z.number().int().positive(),
  source: z.string().optional(),
  rotationApplied: z.boolean().optional(),
  angle: OrientationAngleSchema.optional(),
  error: z.string().optional(),
});
export type PageMeta = z.infer<typeof PageMetaSchema>;

export const QualityReportSchema = z.object({
  mode: z.literal('test').optional(),
  textSource: z.string(),
  pages: z.array(PageMetaSchema),
  warnings: z.array(z.string()),
});
export type QualityReport = z.infer<typeof QualityReportSchema>;

export const StatementResultSchema = z.object({
  fields: ExtractedStatementSchema,
  insights: z.array(z.string()),
  quality: QualityReportSchema,
});
export type StatementResult = z.infer<typeof StatementResultSchema>;

export const InsightsSchema = z.array(z.string());
