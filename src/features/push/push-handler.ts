import type { IEntryStore } from '@domain/ports/entry-store.js';
import type { IGitRunner } from '@domain/ports/git-runner.js';
import type { GitStepOutcome } from '@domain/types/git.js';
import type { AggregationReport } from '@domain/types/journal.js';
import type { ResolvedJournal } from '@infra/config/journal-config.js';
import { runAggregation } from '@features/aggregate/aggregator.js';
import { toDateKey } from '@shared/lib/dates.js';
import { GitCommandError, NotAGitRepositoryError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

const FALLBACK_BRANCH = 'main';

export interface PushOptions {
  journal: ResolvedJournal;
  store: IEntryStore;
  git: IGitRunner;
  now?: Date;
}

export interface PushResult {
  report: AggregationReport;
  steps: GitStepOutcome[];
  /** False when the final push (and its upstream retry) failed; the commit is kept */
  pushed: boolean;
}

export function commitMessage(now: Date): string {
  return `Update journal logs on ${toDateKey(now)}`;
}

function currentBranch(git: IGitRunner): string {
  const result = git.run(['branch', '--show-current']);
  const branch = result.ok ? result.output.trim() : '';
  return branch || FALLBACK_BRANCH;
}

/**
 * Push to the remote; on failure retry once with `-u origin <branch>` so a
 * fresh clone without upstream tracking still publishes.
 */
function pushWithUpstreamFallback(git: IGitRunner): GitStepOutcome {
  const first = git.run(['push']);
  if (first.ok) {
    return { step: 'push', ok: true, output: first.output };
  }

  logger.warn(`git push failed, retrying with upstream: ${first.output}`);
  const branch = currentBranch(git);
  const retry = git.run(['push', '-u', 'origin', branch]);
  return {
    step: 'push',
    ok: retry.ok,
    output: retry.output,
    detail: retry.ok ? `pushed with upstream origin/${branch}` : `push failed: ${first.output}`,
  };
}

/**
 * Aggregate, then `git add`, `git commit`, `git push`.
 *
 * add and commit failures throw GitCommandError and nothing is pushed.
 * A clean tree is not a commit failure. A push failure is returned in the
 * result, leaving the local commit in place.
 */
export function pushJournal(options: PushOptions): PushResult {
  const { journal, store, git } = options;
  const now = options.now ?? new Date();

  if (!git.isRepository()) {
    throw new NotAGitRepositoryError(journal.root);
  }

  const report = runAggregation({ journal, store, now });
  const steps: GitStepOutcome[] = [];

  const addArgs = ['add', '-A'];
  const add = git.run(addArgs);
  if (!add.ok) throw new GitCommandError(addArgs, add.output);
  steps.push({ step: 'add', ok: true, output: add.output });

  const commitArgs = ['commit', '-m', commitMessage(now)];
  const commit = git.run(commitArgs);
  if (commit.ok) {
    steps.push({ step: 'commit', ok: true, output: commit.output });
  } else if (commit.output.includes('nothing to commit')) {
    steps.push({ step: 'commit', ok: true, output: commit.output, detail: 'nothing to commit, working tree clean' });
  } else {
    throw new GitCommandError(commitArgs, commit.output);
  }

  const push = pushWithUpstreamFallback(git);
  steps.push(push);
  if (!push.ok) {
    logger.error(`git push failed; the local commit is kept: ${push.output}`);
  }

  return { report, steps, pushed: push.ok };
}
