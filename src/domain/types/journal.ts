import { z } from 'zod/v4';
import { isDateKey } from '@shared/lib/dates.js';

/** ISO 8601 calendar date, `YYYY-MM-DD`, naming exactly one entry file. */
export const DateKeySchema = z.string().refine(isDateKey, { message: 'Expected a calendar date in YYYY-MM-DD form' });

export type DateKey = z.infer<typeof DateKeySchema>;

/** An entry file located in the entry store, not yet read. */
export interface EntryRef {
  date: DateKey;
  path: string;
}

export interface JournalEntry extends EntryRef {
  content: string;
}

export interface CategorySection {
  category: string;
  /** Raw lines between the heading and the next heading, in file order */
  lines: string[];
}

export interface AggregateRecord {
  date: DateKey;
  category: string;
  text: string;
}

export interface AggregateTable {
  category: string;
  records: AggregateRecord[];
}

export interface SkippedFile {
  file: string;
  reason: string;
}

/** Outcome of listing the entry store: parsable entries plus names that were rejected. */
export interface EntryListing {
  entries: EntryRef[];
  skipped: SkippedFile[];
}

export interface TimeTrackingFields {
  startTime?: string;
  endTime?: string;
  extraHours?: string;
}

export interface AggregationReport {
  outputPath: string;
  entriesRead: number;
  recordCounts: Record<string, number>;
  skipped: SkippedFile[];
  /** Path of the rewritten README, when the overview is enabled */
  overviewPath?: string;
}
