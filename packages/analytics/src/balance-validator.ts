/**
 * Balance consistency check for an extracted statement summary.
 * Verifies that: opening_balance + total_credits - total_debits ≈ closing_balance
 */

import { BALANCE_TOLERANCE, roundToTwoDecimals, toMoney } from '@stmtlens/types';

type MoneyInput = number | string | null | undefined;

export interface BalanceSummaryInput {
  opening_balance?: MoneyInput;
  closing_balance?: MoneyInput;
  total_credits?: MoneyInput;
  total_debits?: MoneyInput;
}

export interface BalanceCheck {
  passed: boolean;
  openingBalance: number;
  closingBalance: number;
  totalCredits: number;
  totalDebits: number;
  calculatedClosing: number;
  difference: number;
  tolerance: number;
}

/**
 * Compute the balance equation. Missing fields count as 0.
 * Throws when a field is present but not a number.
 */
export function checkBalances(
  summary: BalanceSummaryInput,
  tolerance: number = BALANCE_TOLERANCE
): BalanceCheck {
  const openingBalance = toMoney(summary.opening_balance, 'opening_balance');
  const totalCredits = toMoney(summary.total_credits, 'total_credits');
  const totalDebits = toMoney(summary.total_debits, 'total_debits');
  const closingBalance = toMoney(summary.closing_balance, 'closing_balance');

  const calculatedClosing = roundToTwoDecimals(openingBalance + totalCredits - totalDebits);
  const difference = Math.abs(calculatedClosing - closingBalance);

  return {
    passed: difference <= tolerance,
    openingBalance,
    closingBalance,
    totalCredits,
    totalDebits,
    calculatedClosing,
    difference,
    tolerance,
  };
}

/**
 * Validate a summary and return human-readable warnings.
 * An empty array means the balances reconcile; this never throws.
 */
export function validateBalances(
  summary: BalanceSummaryInput,
  tolerance: number = BALANCE_TOLERANCE
): string[] {
  const warnings: string[] = [];

  try {
    const check = checkBalances(summary, tolerance);
    if (!check.passed) {
      warnings.push(
        `Balance mismatch: opening(${check.openingBalance}) + credits(${check.totalCredits}) - debits(${check.totalDebits}) = ${check.calculatedClosing}, but closing = ${check.closingBalance}.`
      );
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warnings.push(`Balance validation error: ${message}`);
  }

  return warnings;
}
