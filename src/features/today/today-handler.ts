import type { IEntryStore } from '@domain/ports/entry-store.js';
import type { JournalConfig } from '@domain/types/config.js';
import type { DateKey } from '@domain/types/journal.js';
import { isDateKey, toDateKey } from '@shared/lib/dates.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { renderDailyEntry } from './daily-template.js';

export interface TodayOptions {
  store: IEntryStore;
  config: JournalConfig;
  /** Clock used to pick today's date. Defaults to the current time. */
  now?: Date;
  /** Explicit date key, overriding the clock */
  date?: string;
}

export interface TodayResult {
  date: DateKey;
  path: string;
}

/**
 * Create the entry for today (or `options.date`).
 * Never overwrites: an existing file raises EntryAlreadyExistsError and is left untouched.
 */
export function createTodayEntry(options: TodayOptions): TodayResult {
  const { store, config } = options;

  let date: DateKey;
  if (options.date !== undefined) {
    if (!isDateKey(options.date)) {
      throw new ValidationError(`Invalid date "${options.date}". Expected YYYY-MM-DD.`, [
        { path: 'date', message: 'not a calendar date' },
      ]);
    }
    date = options.date;
  } else {
    date = toDateKey(options.now ?? new Date());
  }

  const path = store.create(date, renderDailyEntry(date, config));
  logger.debug('Created entry', { date, path });
  return { date, path };
}
