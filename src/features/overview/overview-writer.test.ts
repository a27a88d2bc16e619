import { mkdtempSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JournalConfigSchema, type JournalConfig } from '@domain/types/config.js';
import type { ResolvedJournal } from '@infra/config/journal-config.js';
import type { Aggregation } from '@features/aggregate/aggregator.js';
import { writeOverview } from './overview-writer.js';

let tempDir: string;

function makeJournal(overrides: Partial<JournalConfig> = {}): ResolvedJournal {
  const config = JournalConfigSchema.parse({ categories: ['Ideas'], ...overrides });
  const root = join(tempDir, 'journal');
  mkdirSync(root, { recursive: true });
  return {
    root,
    config,
    entriesDir: join(root, config.entriesDir),
    aggregatePath: join(root, config.aggregateFile),
  };
}

const aggregation: Aggregation = {
  entries: [
    {
      date: '2024-01-01',
      path: '/unused/2024-01-01.md',
      content: '## Time Tracking\n- **Start time**: 9:00\n- **End time**: 17:30\n## Ideas\n- Alpha\n',
    },
    { date: '2024-01-02', path: '/unused/2024-01-02.md', content: '## Ideas\n- Beta\n' },
  ],
  skipped: [],
  tables: [
    {
      category: 'Ideas',
      records: [
        { date: '2024-01-01', category: 'Ideas', text: 'Alpha' },
        { date: '2024-01-02', category: 'Ideas', text: 'Beta' },
      ],
    },
  ],
};

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'jlog-overview-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('writeOverview', () => {
  it('writes README.md at the journal root with worked hours per day', () => {
    const journal = makeJournal();

    const path = writeOverview({ journal, aggregation, now: new Date(2024, 0, 3, 12) });

    expect(path).toBe(join(journal.root, 'README.md'));
    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines).toContain('- **Total records**: 2');
    expect(lines).toContain('- **Total work time**: 7.5h (1 days)');
    expect(lines).toContain('| 2024-01-02 | [2024-01-02](entries/2024-01-02.md) | - | 2 |');
    expect(lines).toContain('| 2024-01-01 | [2024-01-01](entries/2024-01-01.md) | 7.5h | 1 |');
    expect(lines).toContain('Every record is listed in [aggregate.md](aggregate.md).');
  });

  it('leaves out work time when time tracking is disabled', () => {
    const journal = makeJournal({ timeTracking: false });

    const content = readFileSync(writeOverview({ journal, aggregation, now: new Date(2024, 0, 3, 12) }), 'utf-8');

    expect(content).not.toContain('Work Time');
    expect(content.split('\n')).toContain('| 2024-01-01 | [2024-01-01](entries/2024-01-01.md) | 1 |');
  });

  it('links a nested aggregate file relative to the root', () => {
    const journal = makeJournal({ aggregateFile: 'docs/all.md' });

    const content = readFileSync(writeOverview({ journal, aggregation, now: new Date(2024, 0, 3, 12) }), 'utf-8');

    expect(content.split('\n')).toContain('Every record is listed in [docs/all.md](docs/all.md).');
  });
});
