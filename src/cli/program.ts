import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerTodayCommand } from './commands/today.js';
import { registerAggregateCommand } from './commands/aggregate.js';
import { registerPushCommand } from './commands/push.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('jlog')
    .description('A markdown journaling CLI: daily entries, category tables, git sync')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--root <path>', 'Journal root directory (default: JLOG_ROOT or the journal from "jlog init")')
    .showHelpAfterError();

  // Wire --verbose / --json to the logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setLoggerOptions({
      level: opts['verbose'] ? 'debug' : 'info',
      json: !!opts['json'],
    });
  });

  registerInitCommand(program);
  registerTodayCommand(program);
  registerAggregateCommand(program);
  registerPushCommand(program);

  return program;
}
