export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Length of a range in days (fractional), never negative
 */
export function spanDays(start: Date, end: Date): number {
  return Math.max((end.getTime() - start.getTime()) / DAY_MS, 0);
}

/**
 * Whole days between start and end, never negative
 */
export function wholeDays(start: Date, end: Date): number {
  return Math.floor(spanDays(start, end));
}

/**
 * Days of [start, end] that fall inside [windowStart, windowEnd]
 */
export function overlapDays(
  start: Date,
  end: Date,
  windowStart: Date,
  windowEnd: Date
): number {
  const from = Math.max(start.getTime(), windowStart.getTime());
  const to = Math.min(end.getTime(), windowEnd.getTime());
  return Math.max((to - from) / DAY_MS, 0);
}

export function rangesIntersect(
  aStart: Date,
  aEnd: Date,
  bStart: Date,
  bEnd: Date
): boolean {
  return aStart.getTime() <= bEnd.getTime() && bStart.getTime() <= aEnd.getTime();
}

/**
 * Saturday or Sunday, in UTC
 */
export function isWeekend(date: Date): boolean {
  const day = date.getUTCDay();
  return day === 0 || day === 6;
}

/**
 * Inclusive calendar-date range "YYYY-MM-DD".."YYYY-MM-DD" as UTC instants
 */
export function calendarRange(start: string, end: string): { from: Date; to: Date } {
  return {
    from: new Date(`${start}T00:00:00.000Z`),
    to: new Date(`${end}T23:59:59.999Z`),
  };
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
