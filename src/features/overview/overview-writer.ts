import { writeFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import type { ResolvedJournal } from '@infra/config/journal-config.js';
import type { Aggregation } from '@features/aggregate/aggregator.js';
import { computeWorkHours, parseTimeTracking } from '@features/aggregate/time-tracking.js';
import { JLOG_DIRS } from '@shared/constants/paths.js';
import { toDateKey } from '@shared/lib/dates.js';
import { EntryStoreError } from '@shared/lib/errors.js';
import { renderOverview, type OverviewDay } from './overview-renderer.js';

export interface WriteOverviewOptions {
  journal: ResolvedJournal;
  aggregation: Aggregation;
  now: Date;
}

function linkPath(root: string, target: string): string {
  return relative(root, target).split(sep).join('/');
}

/** Rewrite README.md at the journal root; returns its path. */
export function writeOverview(options: WriteOverviewOptions): string {
  const { journal, aggregation } = options;
  const { config } = journal;

  const days: OverviewDay[] = aggregation.entries.map((entry) => ({
    date: entry.date,
    workHours: config.timeTracking ? computeWorkHours(parseTimeTracking(entry.content)) : null,
  }));

  const recordCounts: Record<string, number> = {};
  for (const table of aggregation.tables) {
    recordCounts[table.category] = table.records.length;
  }

  const content = renderOverview({
    days,
    recordCounts,
    categories: config.categories,
    aggregateLink: linkPath(journal.root, journal.aggregatePath),
    entriesLink: linkPath(journal.root, journal.entriesDir),
    timeTracking: config.timeTracking,
    today: toDateKey(options.now),
  });

  const path = join(journal.root, JLOG_DIRS.readme);
  try {
    writeFileSync(path, content, 'utf-8');
  } catch (err) {
    throw new EntryStoreError(`Cannot write ${path}: ${err instanceof Error ? err.message : String(err)}`, path, err);
  }
  return path;
}
