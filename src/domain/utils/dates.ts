const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Calendar day (UTC) of the given instant in YYYY-MM-DD format.
 */
export function toDateKey(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function todayKey(clock: Clock = systemClock): string {
  return toDateKey(clock());
}

/**
 * Parses a YYYY-MM-DD string naming a real calendar day.
 * Returns the UTC midnight of that day, or null for anything else
 * ("2024-02-30", "2024-1-05", "not-a-date").
 */
export function parseDateKey(value: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) {
    return null;
  }

  // setUTCFullYear keeps years below 100 as-is, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function isDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

function requireDate(value: string): Date {
  const date = parseDateKey(value);
  if (!date) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return date;
}

export function addDays(dateKey: string, days: number): string {
  const date = requireDate(dateKey);
  date.setUTCDate(date.getUTCDate() + days);
  return toDateKey(date);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((requireDate(to).getTime() - requireDate(from).getTime()) / MS_PER_DAY);
}

/**
 * Every date from `from` to `to`, both included. Empty when `from` is after `to`.
 */
export function dateRange(from: string, to: string): string[] {
  const dates: string[] = [];
  const total = daysBetween(from, to);
  for (let offset = 0; offset <= total; offset++) {
    dates.push(addDays(from, offset));
  }
  return dates;
}

export function maxDateKey(a: string, b: string): string {
  // YYYY-MM-DD strings sort chronologically
  return a > b ? a : b;
}
