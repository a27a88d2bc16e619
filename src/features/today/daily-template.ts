import type { JournalConfig } from '@domain/types/config.js';
import type { DateKey } from '@domain/types/journal.js';
import { TIME_TRACKING_HEADING } from '@shared/constants/paths.js';
import { weekdayOf } from '@shared/lib/dates.js';

export const TIME_TRACKING_FIELDS = ['Start time', 'End time', 'Extra hours'] as const;

/**
 * Render a fresh entry: a date/weekday title, the optional time tracking
 * block, then one empty `## <category>` section per configured category.
 */
export function renderDailyEntry(date: DateKey, config: Pick<JournalConfig, 'categories' | 'timeTracking'>): string {
  const lines: string[] = [`# ${date} (${weekdayOf(date)})`, ''];

  if (config.timeTracking) {
    lines.push(`## ${TIME_TRACKING_HEADING}`, '');
    for (const field of TIME_TRACKING_FIELDS) {
      lines.push(`- **${field}**:`);
    }
    lines.push('');
  }

  for (const category of config.categories) {
    lines.push(`## ${category}`, '');
  }

  return lines.join('\n');
}
