import type { DateKey } from '@domain/types/journal.js';
import { addDays, startOfWeek } from '@shared/lib/dates.js';
import { formatHours } from '@features/aggregate/time-tracking.js';
import { currentStreak, streakRows } from './streaks.js';

export interface OverviewDay {
  date: DateKey;
  /** Worked hours for the day, null when not tracked */
  workHours: number | null;
}

export interface OverviewInput {
  /** One per entry read, any order */
  days: OverviewDay[];
  recordCounts: Record<string, number>;
  categories: readonly string[];
  /** Link targets, relative to the journal root, with forward slashes */
  aggregateLink: string;
  entriesLink: string;
  timeTracking: boolean;
  today: DateKey;
}

function formatTotal(days: readonly OverviewDay[], suffix = ''): string {
  const tracked = days.filter((d) => d.workHours !== null);
  if (tracked.length === 0) return '-';
  const total = tracked.reduce((sum, d) => sum + (d.workHours ?? 0), 0);
  return `${formatHours(total)} (${tracked.length} days${suffix})`;
}

/** Total for the Monday–Sunday week containing `today`. */
export function currentWeekWorkTime(days: readonly OverviewDay[], today: DateKey): string {
  const monday = startOfWeek(today);
  const sunday = addDays(monday, 6);
  const inWeek = days.filter((d) => d.date >= monday && d.date <= sunday);
  return formatTotal(inWeek, `, ${monday} to ${sunday}`);
}

export function totalWorkTime(days: readonly OverviewDay[]): string {
  return formatTotal(days);
}

export function renderOverview(input: OverviewInput): string {
  const days = [...input.days].sort((a, b) => b.date.localeCompare(a.date));
  const datesDesc = days.map((d) => d.date);
  const hoursByDate = new Map(days.map((d) => [d.date, d.workHours]));
  const totalRecords = Object.values(input.recordCounts).reduce((sum, n) => sum + n, 0);

  const lines: string[] = [
    '# Journal',
    '',
    '## Overview',
    '',
    `- **Total records**: ${totalRecords}`,
    `- **Days logged**: ${days.length}`,
    `- **Latest entry**: ${datesDesc[0] ?? 'No entries yet'}`,
    `- **Current streak**: ${currentStreak(datesDesc)} days`,
  ];
  if (input.timeTracking) {
    lines.push(
      `- **Current week work time**: ${currentWeekWorkTime(days, input.today)}`,
      `- **Total work time**: ${totalWorkTime(days)}`,
    );
  }

  lines.push('', '## Categories', '');
  for (const category of input.categories) {
    lines.push(`- ${category}: ${input.recordCounts[category] ?? 0}`);
  }
  lines.push('', `Every record is listed in [${input.aggregateLink}](${input.aggregateLink}).`);

  if (days.length > 0) {
    lines.push('', '## Latest Entries', '');
    if (input.timeTracking) {
      lines.push('| Date | Entry | Work Time | Streak |', '| --- | --- | --- | --- |');
    } else {
      lines.push('| Date | Entry | Streak |', '| --- | --- | --- |');
    }

    for (const row of streakRows(datesDesc)) {
      if (row.kind === 'break') {
        const cell = `Break: ${row.days} days`;
        lines.push(input.timeTracking ? `| | | | ${cell} |` : `| | | ${cell} |`);
        continue;
      }
      const link = `[${row.date}](${input.entriesLink}/${row.date}.md)`;
      const work = input.timeTracking ? ` ${formatHours(hoursByDate.get(row.date) ?? null)} |` : '';
      lines.push(`| ${row.date} | ${link} |${work} ${row.streak} |`);
    }
  }

  lines.push(
    '',
    '## Usage',
    '',
    '- `jlog init` - Initialize a new journal',
    "- `jlog today` - Create today's entry",
    '- `jlog aggregate` - Update the aggregate document and this overview',
    '- `jlog push` - Aggregate, then commit and push with git',
    '',
  );

  return lines.join('\n');
}
