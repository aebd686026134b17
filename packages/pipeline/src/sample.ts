import { TEXT_SOURCES, type StatementResult } from '@stmtlens/types';

/**
 * Fixed result returned in test mode, without any model calls.
 */
export function sampleStatementResult(): StatementResult {
  return {
    fields: {
      fields: {
        bank_name: 'Sample Savings Bank',
        account_holder_name: 'A. SAMPLE HOLDER',
        account_number_masked: '********9272',
        statement_month: '2025-09',
        account_type: 'Savings',
        currency: 'INR',
      },
      summary: {
        opening_balance: 42000,
        closing_balance: 38500,
        total_credits: 30000,
        total_debits: 33500,
        average_daily_balance: 40000.5,
        overdraft_count: 0,
        nsf_count: 0,
      },
      transactions: [
        {
          date: '2025-09-01',
          description: 'SALARY CREDIT',
          amount: 30000,
          balance: 72000,
          category: 'CREDIT',
        },
        {
          date: '2025-09-10',
          description: 'ATM CASH WITHDRAWAL',
          amount: -33500,
          balance: 38500,
          category: 'ATM',
        },
      ],
    },
    insights: [
      'Salary of ₹30,000 credited on 1 Sep.',
      'Single ATM withdrawal of ₹33,500 detected.',
      'Closing balance stands at ₹38,500 with no overdrafts.',
      'Healthy cash flow pattern for this month.',
    ],
    quality: {
      mode: 'test',
      textSource: TEXT_SOURCES.SAMPLE,
      pages: [],
      warnings: [],
    },
  };
}
