import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { IGitRunner } from '@domain/ports/git-runner.js';
import type { GitResult } from '@domain/types/git.js';
import { logger } from '@shared/lib/logger.js';

/**
 * Runs git as a blocking subprocess in the journal root.
 * No timeout is applied: a credential prompt blocks until the user interrupts.
 */
export class GitRunner implements IGitRunner {
  constructor(private readonly cwd: string) {}

  run(args: string[]): GitResult {
    logger.debug(`git ${args.join(' ')}`, { cwd: this.cwd });
    const proc = spawnSync('git', args, { cwd: this.cwd, encoding: 'utf8' });

    if (proc.error) {
      return { ok: false, output: `failed to run git: ${proc.error.message}` };
    }
    if (proc.status === 0) {
      return { ok: true, output: proc.stdout ?? '' };
    }

    // git prints "nothing to commit" on stdout, most other failures on stderr
    const output = [proc.stderr, proc.stdout]
      .map((s) => (s ?? '').trim())
      .filter(Boolean)
      .join('\n');
    const exit = proc.status !== null ? `exited ${proc.status}` : `killed by signal ${proc.signal ?? 'unknown'}`;
    return { ok: false, output: output || exit };
  }

  isRepository(): boolean {
    return existsSync(join(this.cwd, '.git'));
  }
}
