export function parseAmount(amountStr: string): number {
  const cleaned = amountStr.replace(/[$₹€£,\s]/g, '').replace(/[()]/g, '-');

  // parentheses become minus signs; a minus at either end ("250.00-") marks a debit
  const isNegative = cleaned.startsWith('-') || cleaned.endsWith('-');

  const numStr = cleaned.replace(/^-+/, '').replace(/-$/, '');
  const num = numStr === '' ? NaN : Number(numStr);

  if (isNaN(num)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  return isNegative ? -Math.abs(num) : Math.abs(num);
}

/**
 * Coerce an extracted money value to a number. Missing values and empty
 * strings become 0; anything else that is not a finite number throws.
 */
export function toMoney(value: number | string | null | undefined, field = 'value'): number {
  if (value === null || value === undefined || value === '') {
    return 0;
  }
  const num = typeof value === 'string' ? parseAmount(value) : value;
  if (!Number.isFinite(num)) {
    throw new Error(`${field} is not a finite number: ${String(value)}`);
  }
  return num;
}

/**
 * Round half to even on the exact binary value, so 0.125 becomes 0.12 and
 * 2.675 (stored just below) becomes 2.67.
 */
export function roundToTwoDecimals(num: number): number {
  const scaled = num * 100;
  // only multiples of 1/8 sit exactly on a cent boundary half
  if (Number.isInteger(num * 8) && Math.abs(scaled % 1) === 0.5) {
    const floor = Math.floor(scaled);
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  // toFixed rounds the exact stored value; + 0 drops a negative zero
  return Number(num.toFixed(2)) + 0;
}
