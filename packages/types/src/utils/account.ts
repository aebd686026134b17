import { ACCOUNT_NUMBER_VISIBLE_DIGITS } from './constants.js';

/**
 * Mask all but the last four digits of an account number.
 * Non-digit characters are dropped before masking.
 */
export function maskAccountNumber(accountNumber: string | null | undefined): string | null {
  if (accountNumber === null || accountNumber === undefined || accountNumber === '') {
    return null;
  }

  const digits = accountNumber.replace(/\D/g, '');
  if (digits.length <= ACCOUNT_NUMBER_VISIBLE_DIGITS) {
    return digits;
  }

  const hidden = digits.length - ACCOUNT_NUMBER_VISIBLE_DIGITS;
  return '*'.repeat(hidden) + digits.slice(hidden);
}
