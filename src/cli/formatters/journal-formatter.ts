import type { GitStepOutcome } from '@domain/types/git.js';
import type { AggregationReport } from '@domain/types/journal.js';
import type { InitResult } from '@features/init/init-handler.js';
import type { PushResult } from '@features/push/push-handler.js';
import type { TodayResult } from '@features/today/today-handler.js';
import { weekdayOf } from '@shared/lib/dates.js';

/**
 * Format the result of `jlog init`.
 */
export function formatInitResult(result: InitResult): string {
  const lines: string[] = [];
  lines.push(`✓ Journal initialized at ${result.root}`);
  lines.push('');
  lines.push(`  Entries:    ${result.entriesDir}`);
  lines.push(`  Aggregate:  ${result.aggregatePath}`);
  lines.push(`  Config:     ${result.configPath}`);
  lines.push(`  Categories: ${result.config.categories.join(', ')}`);

  if (result.git.initialized) {
    lines.push(`  Git:        initialized${result.git.remote ? ` (origin: ${result.git.remote})` : ''}`);
  } else {
    lines.push('  Git:        not initialized');
  }
  for (const warning of result.git.warnings) {
    lines.push(`  ⚠ ${warning}`);
  }

  lines.push('');
  lines.push("  What's next:");
  lines.push("  → Start today's entry:   jlog today");
  lines.push('  → Rebuild the tables:    jlog aggregate');
  return lines.join('\n');
}

export function formatTodayResult(result: TodayResult): string {
  return `✓ Created entry for ${result.date} (${weekdayOf(result.date)})\n  ${result.path}`;
}

/**
 * Format an aggregation report: output path, per-category counts, skipped files.
 */
export function formatAggregationReport(report: AggregationReport): string {
  const lines: string[] = [];
  const entryWord = report.entriesRead === 1 ? 'entry' : 'entries';
  lines.push(`✓ Aggregated ${report.entriesRead} ${entryWord} into ${report.outputPath}`);

  for (const [category, count] of Object.entries(report.recordCounts)) {
    lines.push(`  ${category}: ${count}`);
  }
  if (report.overviewPath) {
    lines.push(`  Overview: ${report.overviewPath}`);
  }
  if (report.skipped.length > 0) {
    lines.push('');
    lines.push(`  Skipped ${report.skipped.length}:`);
    for (const skipped of report.skipped) {
      lines.push(`    ${skipped.file} (${skipped.reason})`);
    }
  }
  return lines.join('\n');
}

function formatStep(outcome: GitStepOutcome): string {
  const mark = outcome.ok ? '✓' : '✗';
  const detail = outcome.detail ? ` (${outcome.detail})` : '';
  return `${mark} git ${outcome.step}${detail}`;
}

export function formatPushResult(result: PushResult): string {
  const lines = [formatAggregationReport(result.report), ''];
  for (const step of result.steps) {
    lines.push(formatStep(step));
  }
  lines.push(result.pushed ? '✓ Journal pushed' : '✗ Push failed; the local commit was kept');
  return lines.join('\n');
}
