const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date of `date` as `YYYY-MM-DD`. */
export function toDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Parse a `YYYY-MM-DD` key into UTC epoch milliseconds.
 * Returns null for malformed keys and impossible dates (2024-02-30).
 */
export function parseDateKey(key: string): number | null {
  const match = DATE_KEY_RE.exec(key);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

export function isDateKey(key: string): boolean {
  return parseDateKey(key) !== null;
}

function requireDateKey(key: string): number {
  const ms = parseDateKey(key);
  if (ms === null) {
    throw new Error(`Invalid date "${key}". Expected YYYY-MM-DD.`);
  }
  return ms;
}

export function weekdayOf(key: string): string {
  const day = new Date(requireDateKey(key)).getUTCDay();
  return WEEKDAYS[day] ?? '';
}

export function addDays(key: string, days: number): string {
  const shifted = new Date(requireDateKey(key) + days * DAY_MS);
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round((requireDateKey(to) - requireDateKey(from)) / DAY_MS);
}

/** Monday of the week containing `key`. */
export function startOfWeek(key: string): string {
  const day = new Date(requireDateKey(key)).getUTCDay();
  return addDays(key, -((day + 6) % 7));
}
