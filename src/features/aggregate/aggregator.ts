import { writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { IEntryStore } from '@domain/ports/entry-store.js';
import type {
  AggregateRecord,
  AggregateTable,
  AggregationReport,
  JournalEntry,
  SkippedFile,
} from '@domain/types/journal.js';
import type { ResolvedJournal } from '@infra/config/journal-config.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import { EntryStoreError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { writeOverview } from '@features/overview/overview-writer.js';
import { extractRecords } from './section-parser.js';
import { renderAggregateDocument } from './table-renderer.js';

export interface EntryCollection {
  entries: JournalEntry[];
  skipped: SkippedFile[];
}

export interface Aggregation extends EntryCollection {
  tables: AggregateTable[];
}

/**
 * Read every entry in date order. Unreadable files are logged and skipped so
 * one bad file never blocks the rest; listing the store itself may throw.
 */
export function collectEntries(store: IEntryStore): EntryCollection {
  const listing = store.list();
  const entries: JournalEntry[] = [];
  const skipped: SkippedFile[] = [...listing.skipped];

  for (const ref of listing.entries) {
    try {
      entries.push({ ...ref, content: store.read(ref) });
    } catch (err) {
      if (!(err instanceof EntryStoreError)) throw err;
      logger.warn(`Skipping unreadable entry ${ref.date}: ${err.message}`, { file: ref.path });
      skipped.push({ file: ref.path, reason: err.message });
    }
  }

  return { entries, skipped };
}

/**
 * Group records into one table per category, in category order. Records are
 * ordered by date; same-date records keep the order they appear in the entry.
 */
export function buildTables(entries: readonly JournalEntry[], categories: readonly string[]): AggregateTable[] {
  const byCategory = new Map<string, AggregateRecord[]>(categories.map((c) => [c, []]));

  for (const entry of entries) {
    for (const record of extractRecords(entry.date, entry.content, categories)) {
      byCategory.get(record.category)?.push(record);
    }
  }

  return categories.map((category) => ({
    category,
    // Array#sort is stable, so ties stay in line order
    records: (byCategory.get(category) ?? []).sort((a, b) => a.date.localeCompare(b.date)),
  }));
}

export function aggregate(store: IEntryStore, categories: readonly string[]): Aggregation {
  const collection = collectEntries(store);
  return { ...collection, tables: buildTables(collection.entries, categories) };
}

export interface RunAggregationOptions {
  journal: ResolvedJournal;
  store: IEntryStore;
  /** Clock for the overview's current-week figures */
  now?: Date;
}

/**
 * Rebuild the aggregate document (and the README overview when enabled).
 * Output depends only on the entry files, so an unchanged journal yields
 * byte-identical aggregate documents.
 */
export function runAggregation(options: RunAggregationOptions): AggregationReport {
  const { journal, store } = options;
  const result = aggregate(store, journal.config.categories);

  JsonStore.ensureDir(dirname(journal.aggregatePath));
  try {
    writeFileSync(journal.aggregatePath, renderAggregateDocument(result.tables), 'utf-8');
  } catch (err) {
    throw new EntryStoreError(
      `Cannot write ${journal.aggregatePath}: ${err instanceof Error ? err.message : String(err)}`,
      journal.aggregatePath,
      err,
    );
  }

  const recordCounts: Record<string, number> = {};
  for (const table of result.tables) {
    recordCounts[table.category] = table.records.length;
  }

  const report: AggregationReport = {
    outputPath: journal.aggregatePath,
    entriesRead: result.entries.length,
    recordCounts,
    skipped: result.skipped,
  };

  if (journal.config.overview) {
    report.overviewPath = writeOverview({ journal, aggregation: result, now: options.now ?? new Date() });
  }

  logger.debug('Aggregation finished', { ...report });
  return report;
}
