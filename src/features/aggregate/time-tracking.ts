import type { TimeTrackingFields } from '@domain/types/journal.js';
import { TIME_TRACKING_HEADING } from '@shared/constants/paths.js';
import { headingText, splitLines } from './section-parser.js';

const FIELD_RE = /(start time|end time|extra hours)\*{0,2}[ \t]*:\*{0,2}[ \t]*(.*)$/i;
const EXTRA_HOURS_RE = /^(\d+(?:\.\d+)?)h?/;
const MINUTES_PER_DAY = 24 * 60;
const LUNCH_BREAK_HOURS = 1;

/** Read Start time / End time / Extra hours from the Time Tracking section. */
export function parseTimeTracking(content: string): TimeTrackingFields {
  const fields: TimeTrackingFields = {};
  let inSection = false;

  for (const line of splitLines(content)) {
    const heading = headingText(line);
    if (heading !== null) {
      inSection = heading === TIME_TRACKING_HEADING;
      continue;
    }
    if (!inSection) continue;

    const match = FIELD_RE.exec(line);
    const value = match?.[2]?.trim();
    if (!match || !value) continue;

    switch (match[1]?.toLowerCase()) {
      case 'start time':
        fields.startTime = value;
        break;
      case 'end time':
        fields.endTime = value;
        break;
      case 'extra hours':
        fields.extraHours = value;
        break;
    }
  }

  return fields;
}

function to24h(hour: number, meridiem: string): number | null {
  if (hour < 1 || hour > 12) return null;
  const pm = meridiem.toLowerCase() === 'pm';
  return (hour % 12) + (pm ? 12 : 0);
}

/**
 * Minutes after midnight for `09:00`, `9:00 AM`, `9:00AM`, `09.00`, `9` or `9 PM`.
 */
export function parseClock(value: string): number | null {
  const text = value.trim();
  let match: RegExpExecArray | null;
  let hour: number | null;
  let minute = 0;

  if ((match = /^(\d{1,2})[:.](\d{2})$/.exec(text))) {
    hour = Number(match[1]);
    minute = Number(match[2]);
  } else if ((match = /^(\d{1,2}):(\d{2})\s*([ap]m)$/i.exec(text))) {
    hour = to24h(Number(match[1]), match[3] ?? '');
    minute = Number(match[2]);
  } else if ((match = /^(\d{1,2})$/.exec(text))) {
    hour = Number(match[1]);
  } else if ((match = /^(\d{1,2})\s*([ap]m)$/i.exec(text))) {
    hour = to24h(Number(match[1]), match[2] ?? '');
  } else {
    return null;
  }

  if (hour === null || hour > 23 || minute > 59) return null;
  return hour * 60 + minute;
}

/**
 * Worked hours: end - start - 1h lunch (floored at zero) plus extra hours.
 * An end before the start is taken as past midnight. Null when start or end is unusable.
 */
export function computeWorkHours(fields: TimeTrackingFields): number | null {
  if (!fields.startTime || !fields.endTime) return null;
  const start = parseClock(fields.startTime);
  let end = parseClock(fields.endTime);
  if (start === null || end === null) return null;

  if (end < start) end += MINUTES_PER_DAY;
  let hours = Math.max(0, (end - start) / 60 - LUNCH_BREAK_HOURS);

  const extra = fields.extraHours ? EXTRA_HOURS_RE.exec(fields.extraHours.trim()) : null;
  if (extra) hours += Number(extra[1]);
  return hours;
}

/** `8h`, `7.5h`, or `-` when unknown. */
export function formatHours(hours: number | null): string {
  if (hours === null) return '-';
  return Number.isInteger(hours) ? `${hours}h` : `${hours.toFixed(1)}h`;
}
