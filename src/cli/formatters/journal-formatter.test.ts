import type { AggregationReport } from '@domain/types/journal.js';
import { JournalConfigSchema } from '@domain/types/config.js';
import type { InitResult } from '@features/init/init-handler.js';
import {
  formatAggregationReport,
  formatInitResult,
  formatPushResult,
  formatTodayResult,
} from './journal-formatter.js';

const report: AggregationReport = {
  outputPath: '/j/aggregate.md',
  entriesRead: 1,
  recordCounts: { Ideas: 2, Done: 0 },
  skipped: [],
};

describe('formatTodayResult', () => {
  it('shows the date, weekday and path', () => {
    expect(formatTodayResult({ date: '2024-01-06', path: '/j/entries/2024-01-06.md' })).toBe(
      '✓ Created entry for 2024-01-06 (Saturday)\n  /j/entries/2024-01-06.md',
    );
  });
});

describe('formatAggregationReport', () => {
  it('lists per-category counts', () => {
    expect(formatAggregationReport(report)).toBe([
      '✓ Aggregated 1 entry into /j/aggregate.md',
      '  Ideas: 2',
      '  Done: 0',
    ].join('\n'));
  });

  it('shows the overview path and skipped files', () => {
    const output = formatAggregationReport({
      ...report,
      entriesRead: 3,
      overviewPath: '/j/README.md',
      skipped: [{ file: 'notes.md', reason: 'unparsable file name' }],
    });

    expect(output.split('\n')).toEqual([
      '✓ Aggregated 3 entries into /j/aggregate.md',
      '  Ideas: 2',
      '  Done: 0',
      '  Overview: /j/README.md',
      '',
      '  Skipped 1:',
      '    notes.md (unparsable file name)',
    ]);
  });
});

describe('formatPushResult', () => {
  it('marks each git step and the overall outcome', () => {
    const output = formatPushResult({
      report,
      steps: [
        { step: 'add', ok: true, output: '' },
        { step: 'commit', ok: true, output: '', detail: 'nothing to commit, working tree clean' },
        { step: 'push', ok: false, output: 'denied', detail: 'push failed: denied' },
      ],
      pushed: false,
    });

    expect(output.split('\n').slice(-4)).toEqual([
      '✓ git add',
      '✓ git commit (nothing to commit, working tree clean)',
      '✗ git push (push failed: denied)',
      '✗ Push failed; the local commit was kept',
    ]);
  });
});

describe('formatInitResult', () => {
  const base: InitResult = {
    root: '/w/journal',
    config: JournalConfigSchema.parse({ categories: ['Ideas', 'Done'] }),
    configPath: '/w/journal/.jlog/config.json',
    entriesDir: '/w/journal/entries',
    aggregatePath: '/w/journal/aggregate.md',
    pointerPath: '/home/.jlog/root.json',
    git: { initialized: false, warnings: [] },
  };

  it('summarizes the created journal', () => {
    const lines = formatInitResult(base).split('\n');
    expect(lines[0]).toBe('✓ Journal initialized at /w/journal');
    expect(lines).toContain('  Categories: Ideas, Done');
    expect(lines).toContain('  Git:        not initialized');
  });

  it('shows the remote and git warnings', () => {
    const lines = formatInitResult({
      ...base,
      git: { initialized: true, remote: 'git@example.com:me/j.git', warnings: ['Failed to add remote'] },
    }).split('\n');

    expect(lines).toContain('  Git:        initialized (origin: git@example.com:me/j.git)');
    expect(lines).toContain('  ⚠ Failed to add remote');
  });
});
