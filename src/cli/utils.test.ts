import { join } from 'node:path';
import { mkdtempSync, mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { JournalConfigSchema } from '@domain/types/config.js';
import { saveJournalConfig } from '@infra/config/journal-config.js';
import { getGlobalOptions, handleCommandError, withCommandContext, withJournalContext } from './utils.js';
import type { CommandContext, JournalCommandContext } from './utils.js';

function spyConsoleError() {
  return vi.spyOn(console, 'error').mockImplementation(() => {});
}

describe('getGlobalOptions', () => {
  it('extracts json, verbose, and root from command options', () => {
    const program = new Command();
    program.option('--json').option('--verbose').option('--root <path>');
    program.parse(['node', 'test', '--json', '--verbose', '--root', '/some/path']);

    expect(getGlobalOptions(program)).toEqual({ json: true, verbose: true, root: '/some/path' });
  });

  it('defaults flags to false and root to undefined', () => {
    const program = new Command();
    program.option('--json').option('--verbose').option('--root <path>');
    program.parse(['node', 'test']);

    expect(getGlobalOptions(program)).toEqual({ json: false, verbose: false, root: undefined });
  });
});

describe('handleCommandError', () => {
  let errorSpy: ReturnType<typeof spyConsoleError>;

  beforeEach(() => {
    errorSpy = spyConsoleError();
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('prints the message and sets exit code 1', () => {
    handleCommandError(new Error('boom'), false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: boom');
    expect(process.exitCode).toBe(1);
  });

  it('prints the stack when verbose', () => {
    handleCommandError(new Error('boom'), true);
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it('stringifies non-Error values', () => {
    handleCommandError('plain', false);
    expect(errorSpy).toHaveBeenCalledWith('Error: plain');
  });
});

describe('withCommandContext / withJournalContext', () => {
  let tempDir: string;
  let errorSpy: ReturnType<typeof spyConsoleError>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'jlog-utils-test-'));
    errorSpy = spyConsoleError();
    vi.stubEnv('JLOG_HOME', join(tempDir, 'home'));
    vi.stubEnv('JLOG_ROOT', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    rmSync(tempDir, { recursive: true, force: true });
  });

  function programWith(action: (...args: unknown[]) => Promise<void>): Command {
    const program = new Command();
    program.option('--json').option('--verbose').option('--root <path>');
    program.exitOverride();
    program.command('run').action(action);
    return program;
  }

  it('passes global options to the handler', async () => {
    const handler = vi.fn((_ctx: CommandContext) => {});
    const program = programWith(withCommandContext(handler));

    await program.parseAsync(['node', 'test', '--json', 'run']);
    const ctx = handler.mock.calls[0]?.[0];
    expect(ctx?.globalOpts.json).toBe(true);
    expect(ctx?.cmd.name()).toBe('run');
  });

  it('resolves the journal before the handler runs', async () => {
    const root = join(tempDir, 'journal');
    mkdirSync(root);
    saveJournalConfig(root, JournalConfigSchema.parse({ categories: ['Ideas'] }));

    const handler = vi.fn((_ctx: JournalCommandContext) => {});
    const program = programWith(withJournalContext(handler));

    await program.parseAsync(['node', 'test', '--root', root, 'run']);
    const ctx = handler.mock.calls[0]?.[0];
    expect(ctx?.journal.root).toBe(root);
    expect(ctx?.journal.config.categories).toEqual(['Ideas']);
  });

  it('reports a missing journal without calling the handler', async () => {
    const handler = vi.fn();
    const program = programWith(withJournalContext(handler));

    await program.parseAsync(['node', 'test', '--root', join(tempDir, 'missing'), 'run']);
    expect(handler).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      `Error: Journal directory "${join(tempDir, 'missing')}" does not exist. Run "jlog init" first.`,
    );
  });
});
