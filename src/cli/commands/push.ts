import type { Command } from 'commander';
import { EntryStore } from '@infra/persistence/entry-store.js';
import { GitRunner } from '@infra/git/git-runner.js';
import { pushJournal } from '@features/push/push-handler.js';
import { formatPushResult } from '@cli/formatters/journal-formatter.js';
import { withJournalContext } from '@cli/utils.js';

/**
 * Register the `jlog push` command.
 */
export function registerPushCommand(program: Command): void {
  program
    .command('push')
    .description('Aggregate, then git add, commit and push the journal')
    .action(withJournalContext((ctx) => {
      const result = pushJournal({
        journal: ctx.journal,
        store: new EntryStore(ctx.journal.entriesDir),
        git: new GitRunner(ctx.journal.root),
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(formatPushResult(result));
      }
    }));
}
