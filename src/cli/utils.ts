import { Command } from 'commander';
import { openJournal, type ResolvedJournal } from '@infra/config/journal-config.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  root?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  cmd: Command;
}

export interface JournalCommandContext extends CommandContext {
  journal: ResolvedJournal;
}

type Handler<C> = (ctx: C) => void | Promise<void>;

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  const root: unknown = opts['root'];
  return {
    json: !!opts['json'],
    verbose: !!opts['verbose'],
    root: typeof root === 'string' ? root : undefined,
  };
}

/**
 * Commander passes (...positionalArgs, localOpts, cmd) to an action; the
 * command is always last.
 */
function commandFromArgs(args: unknown[]): Command {
  const cmd = args[args.length - 1];
  if (!(cmd instanceof Command)) {
    throw new Error('Action invoked without a Command instance');
  }
  return cmd;
}

/**
 * Wrap a handler that needs no journal (init). Errors are reported and
 * turned into a non-zero exit code.
 */
export function withCommandContext(handler: Handler<CommandContext>): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = commandFromArgs(args);
    const globalOpts = getGlobalOptions(cmd);
    try {
      await handler({ globalOpts, cmd });
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Wrap a handler that works on an existing journal. The root and config are
 * resolved before the handler runs, so configuration errors surface before any
 * entry is touched.
 */
export function withJournalContext(handler: Handler<JournalCommandContext>): (...args: unknown[]) => Promise<void> {
  return withCommandContext(async (ctx) => {
    const journal = openJournal(ctx.globalOpts.root);
    await handler({ ...ctx, journal });
  });
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and the stack trace when verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
