import type { Command } from 'commander';
import { EntryStore } from '@infra/persistence/entry-store.js';
import { runAggregation } from '@features/aggregate/aggregator.js';
import { formatAggregationReport } from '@cli/formatters/journal-formatter.js';
import { withJournalContext } from '@cli/utils.js';

/**
 * Register the `jlog aggregate` command.
 */
export function registerAggregateCommand(program: Command): void {
  program
    .command('aggregate')
    .description('Rebuild the per-category tables from every entry')
    .action(withJournalContext((ctx) => {
      const report = runAggregation({
        journal: ctx.journal,
        store: new EntryStore(ctx.journal.entriesDir),
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatAggregationReport(report));
      }
    }));
}
