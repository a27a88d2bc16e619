import type { AggregateRecord, CategorySection, DateKey } from '@domain/types/journal.js';

const HEADING_RE = /^#{1,6}[ \t]+(.*?)[ \t]*$/;
const LIST_MARKER_RE = /^(?:[-*+]|\d+[.)])(?:[ \t]+|$)/;

/** Text of an ATX heading line (`## Ideas` → `Ideas`), or null for any other line. */
export function headingText(line: string): string | null {
  const match = HEADING_RE.exec(line);
  return match ? (match[1] ?? '') : null;
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * Split an entry into sections by exact, case-sensitive heading match.
 *
 * Lines before the first recognized heading are dropped. Any other heading
 * closes the current section and its lines belong to no category.
 */
export function parseSections(content: string, categories: readonly string[]): CategorySection[] {
  const known = new Set(categories);
  const sections: CategorySection[] = [];
  let current: CategorySection | null = null;

  for (const line of splitLines(content)) {
    const heading = headingText(line);
    if (heading !== null) {
      current = known.has(heading) ? { category: heading, lines: [] } : null;
      if (current) sections.push(current);
      continue;
    }
    current?.lines.push(line);
  }

  return sections;
}

/**
 * The record text for one section line: trimmed, leading list marker removed.
 * Returns null for blank lines and bare markers left over from the template.
 */
export function recordText(line: string): string | null {
  const text = line.trim().replace(LIST_MARKER_RE, '').trim();
  return text.length > 0 ? text : null;
}

/** Flatten an entry's sections into records, preserving line order. */
export function extractRecords(date: DateKey, content: string, categories: readonly string[]): AggregateRecord[] {
  const records: AggregateRecord[] = [];
  for (const section of parseSections(content, categories)) {
    for (const line of section.lines) {
      const text = recordText(line);
      if (text !== null) {
        records.push({ date, category: section.category, text });
      }
    }
  }
  return records;
}
