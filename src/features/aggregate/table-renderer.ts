import type { AggregateTable } from '@domain/types/journal.js';

export const TABLE_HEADER = '| Date | Entry |';
export const TABLE_DIVIDER = '| --- | --- |';

/** Escape pipes so a record never adds a column to its row. */
export function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

export function renderTable(table: AggregateTable): string {
  const lines = [`## ${table.category}`, '', TABLE_HEADER, TABLE_DIVIDER];
  for (const record of table.records) {
    lines.push(`| ${record.date} | ${escapeCell(record.text)} |`);
  }
  return lines.join('\n');
}

/**
 * One table per category, in the order given, separated by a blank line.
 * Empty categories still get their heading and header rows.
 */
export function renderAggregateDocument(tables: readonly AggregateTable[]): string {
  return tables.map(renderTable).join('\n\n') + '\n';
}
