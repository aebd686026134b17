/**
 * Time-weighted average daily balance over the statement period.
 *
 * Each running balance is weighted by the number of days it was held until the
 * next dated transaction; the last balance counts once for the final day of
 * the inclusive span.
 */

import { roundToTwoDecimals, toCalendarDay } from '@stmtlens/types';

export interface BalancePoint {
  date?: string | null | undefined;
  balance?: number | null | undefined;
}

export interface DatedBalance {
  day: number;
  balance: number;
}

/**
 * Keep only points with a parseable calendar date and a finite balance,
 * sorted ascending by day. Array.prototype.sort is stable, so same-day
 * entries keep their input order.
 */
export function toDatedBalances(transactions: readonly BalancePoint[]): DatedBalance[] {
  const points: DatedBalance[] = [];

  for (const txn of transactions) {
    const day = toCalendarDay(txn.date);
    const balance = txn.balance;
    if (day === null || typeof balance !== 'number' || !Number.isFinite(balance)) {
      continue;
    }
    points.push({ day, balance });
  }

  return points.sort((a, b) => a.day - b.day);
}

export function computeAverageDailyBalance(
  transactions: readonly BalancePoint[],
  openingBalance?: number | null
): number {
  const fallback = openingBalance ?? 0;
  if (transactions.length === 0) {
    return fallback;
  }

  const points = toDatedBalances(transactions);
  const first = points[0];
  const last = points[points.length - 1];
  if (first === undefined || last === undefined) {
    return fallback;
  }

  const totalDays = last.day - first.day + 1;

  let weighted = 0;
  let prev = first;
  for (const point of points.slice(1)) {
    // same-day entries still carry one day of weight
    const daysHeld = Math.max(point.day - prev.day, 1);
    weighted += prev.balance * daysHeld;
    prev = point;
  }
  weighted += prev.balance;

  return roundToTwoDecimals(weighted / totalDays);
}
