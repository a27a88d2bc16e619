import type { Command } from 'commander';
import { EntryStore } from '@infra/persistence/entry-store.js';
import { createTodayEntry } from '@features/today/today-handler.js';
import { formatTodayResult } from '@cli/formatters/journal-formatter.js';
import { withJournalContext } from '@cli/utils.js';

/**
 * Register the `jlog today` command.
 */
export function registerTodayCommand(program: Command): void {
  program
    .command('today')
    .description("Create today's entry from the template (never overwrites)")
    .option('--date <YYYY-MM-DD>', 'Create the entry for another date')
    .action(withJournalContext((ctx) => {
      const date: unknown = ctx.cmd.opts()['date'];
      const result = createTodayEntry({
        store: new EntryStore(ctx.journal.entriesDir),
        config: ctx.journal.config,
        date: typeof date === 'string' ? date : undefined,
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(formatTodayResult(result));
      }
    }));
}
