import type { Command } from 'commander';
import { handleInit } from '@features/init/init-handler.js';
import { formatInitResult } from '@cli/formatters/journal-formatter.js';
import { withCommandContext } from '@cli/utils.js';

function parseCategories(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Register the `jlog init` command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a journal folder, its config and (optionally) a git repository')
    .option('--name <dir>', 'Journal folder name (default: journal)')
    .option('--parent <dir>', 'Directory to create the journal in (default: current directory)')
    .option('--categories <list>', 'Comma-separated category headings', parseCategories)
    .option('--git', 'Initialize a git repository')
    .option('--no-git', 'Do not initialize a git repository')
    .option('--remote <url>', 'Remote added as origin')
    .option('--skip-prompts', 'Skip interactive prompts and use defaults')
    .action(withCommandContext(async (ctx) => {
      const localOpts = ctx.cmd.opts();
      const categories: unknown = localOpts['categories'];
      const git: unknown = localOpts['git'];

      const result = await handleInit({
        cwd: optionalString(localOpts['parent']) ?? process.cwd(),
        name: optionalString(localOpts['name']),
        categories: Array.isArray(categories) ? categories.map(String) : undefined,
        git: typeof git === 'boolean' ? git : undefined,
        remote: optionalString(localOpts['remote']),
        skipPrompts: !!localOpts['skipPrompts'],
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(formatInitResult(result));
      }
    }));
}
