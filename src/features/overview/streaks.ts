import type { DateKey } from '@domain/types/journal.js';
import { addDays, daysBetween } from '@shared/lib/dates.js';

/**
 * Group dates (newest first) into runs of consecutive calendar days.
 * `['2024-01-05', '2024-01-04', '2024-01-01']` → `[['2024-01-05', '2024-01-04'], ['2024-01-01']]`
 */
export function consecutiveRuns(datesDesc: readonly DateKey[]): DateKey[][] {
  const runs: DateKey[][] = [];
  let run: DateKey[] = [];

  for (const date of datesDesc) {
    const previous = run[run.length - 1];
    if (previous !== undefined && addDays(previous, -1) !== date) {
      runs.push(run);
      run = [];
    }
    run.push(date);
  }
  if (run.length > 0) runs.push(run);
  return runs;
}

/** Length of the run that contains the most recent date. */
export function currentStreak(datesDesc: readonly DateKey[]): number {
  return consecutiveRuns(datesDesc)[0]?.length ?? 0;
}

export type StreakRow =
  | { kind: 'day'; date: DateKey; streak: number }
  | { kind: 'break'; days: number };

/**
 * Rows for the latest-entries table. Within a run the oldest day is 1 and the
 * newest is the run length; a break row separates runs.
 */
export function streakRows(datesDesc: readonly DateKey[]): StreakRow[] {
  const runs = consecutiveRuns(datesDesc);
  const rows: StreakRow[] = [];

  runs.forEach((run, runIndex) => {
    run.forEach((date, i) => rows.push({ kind: 'day', date, streak: run.length - i }));

    const oldest = run[run.length - 1];
    const next = runs[runIndex + 1]?.[0];
    if (oldest !== undefined && next !== undefined) {
      rows.push({ kind: 'break', days: daysBetween(next, oldest) - 1 });
    }
  });

  return rows;
}
