// Time helpers shared by the lifecycle and sweep code

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

/**
 * Milliseconds elapsed between `since` and `now` (negative if `since` is in the future)
 */
export function ageMs(since: Date, now: Date): number {
  return now.getTime() - since.getTime();
}

/**
 * The later of two dates
 */
export function latest(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * UTC year-month bucket, e.g. 2026-03
 */
export function monthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}
