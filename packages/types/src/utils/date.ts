const MS_PER_DAY = 86_400_000;

/**
 * Parse an ISO calendar date (`YYYY-MM-DD`, optionally followed by a time part)
 * into a day number counted from the Unix epoch. Returns null for anything that
 * is not a real calendar date.
 */
export function toCalendarDay(dateStr: string | null | undefined): number | null {
  if (typeof dateStr !== 'string') return null;

  const match = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.+\-Z]*)?$/.exec(dateStr.trim());
  if (match === null) return null;

  const [, yearStr, monthStr, dayStr] = match;
  if (yearStr === undefined || monthStr === undefined || dayStr === undefined) {
    return null;
  }

  const year = parseInt(yearStr, 10);
  const month = parseInt(monthStr, 10);
  const day = parseInt(dayStr, 10);
  const utc = Date.UTC(year, month - 1, day);
  const check = new Date(utc);

  // Date.UTC rolls 2025-02-30 over into March
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return Math.floor(utc / MS_PER_DAY);
}
