import { describe, it, expect } from 'vitest';
import {
  ExtractedStatementSchema,
  ModelExtractionSchema,
  OrientationAngleSchema,
  PageMetaSchema,
  SummarySchema,
  TransactionSchema,
} from '@stmtlens/types';

describe('TransactionSchema', () => {
  it('should coerce formatted amounts', () => {
    const result = TransactionSchema.parse({
      date: '2025-09-05',
      description: 'SALARY',
      amount: '30,000.00',
      balance: '72,000.00',
    });

    expect(result).toEqual({ date: '2025-09-05', description: 'SALARY', amount: 30000, balance: 72000 });
  });

  it('should turn blank amounts into null', () => {
    expect(TransactionSchema.parse({ amount: '  ' }).amount).toBeNull();
  });

  it('should null out amounts that do not parse', () => {
    expect(TransactionSchema.parse({ amount: 'twelve', balance: 5 })).toEqual({ amount: null, balance: 5 });
  });

  it('should turn numeric text fields into strings', () => {
    expect(TransactionSchema.parse({ description: 1042, category: { kind: 'ATM' } })).toEqual({
      description: '1042',
      category: null,
    });
  });
});

describe('SummarySchema', () => {
  it('should accept counts given as strings', () => {
    expect(SummarySchema.parse({ overdraft_count: '2', nsf_count: 0 })).toEqual({ overdraft_count: 2, nsf_count: 0 });
  });

  it('should null out counts that are not non-negative integers', () => {
    expect(SummarySchema.parse({ nsf_count: -1, overdraft_count: 'many' })).toEqual({ nsf_count: null, overdraft_count: null });
  });

  it('should keep money values that do not parse as text', () => {
    expect(SummarySchema.parse({ opening_balance: 'N/A', closing_balance: '1,250.00' })).toEqual({
      opening_balance: 'N/A',
      closing_balance: 1250,
    });
  });
});

describe('ExtractedStatementSchema', () => {
  it('should default missing sections', () => {
    expect(ExtractedStatementSchema.parse({})).toEqual({ fields: {}, summary: {}, transactions: [] });
  });

  it('should drop transactions that are not objects', () => {
    const result = ExtractedStatementSchema.parse({ transactions: [null, 'x', { amount: 5 }] });

    expect(result.transactions).toEqual([{ amount: 5 }]);
  });

  it('should still reject a transactions value that is not a list', () => {
    expect(ExtractedStatementSchema.safeParse({ transactions: 'none' }).success).toBe(false);
  });
});

describe('ModelExtractionSchema', () => {
  it('should reduce a multi-account response to its first account', () => {
    const result = ModelExtractionSchema.parse({
      accounts: [
        { fields: { bank_name: 'First Bank' } },
        { fields: { bank_name: 'Second Bank' } },
      ],
    });

    expect(result.fields.bank_name).toBe('First Bank');
  });

  it('should accept a single-account response as is', () => {
    expect(ModelExtractionSchema.parse({ summary: { opening_balance: 10 } }).summary).toEqual({ opening_balance: 10 });
  });
});

describe('OrientationAngleSchema', () => {
  it('should accept the four right angles only', () => {
    expect(OrientationAngleSchema.safeParse(270).success).toBe(true);
    expect(OrientationAngleSchema.safeParse(45).success).toBe(false);
    expect(OrientationAngleSchema.safeParse('90').success).toBe(false);
  });
});

describe('PageMetaSchema', () => {
  it('should require a positive page number', () => {
    expect(PageMetaSchema.safeParse({ page: 0 }).success).toBe(false);
    expect(PageMetaSchema.safeParse({ page: 2, error: 'timeout' }).success).toBe(true);
  });
});
