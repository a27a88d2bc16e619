import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { IGitRunner } from '@domain/ports/git-runner.js';
import { JournalConfigSchema, type JournalConfig } from '@domain/types/config.js';
import { GitRunner } from '@infra/git/git-runner.js';
import {
  journalConfigPath,
  rootPointerPath,
  saveJournalConfig,
  saveRootPointer,
} from '@infra/config/journal-config.js';
import { describeIssues } from '@infra/persistence/json-store.js';
import { renderAggregateDocument } from '@features/aggregate/table-renderer.js';
import { DEFAULT_JOURNAL_NAME } from '@shared/constants/paths.js';
import { JournalExistsError, ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface InitOptions {
  cwd: string;
  /** Journal folder name, relative to cwd */
  name?: string;
  categories?: string[];
  /** Run `git init`; prompted when undefined */
  git?: boolean;
  /** Remote added as origin; prompted when undefined and git is enabled */
  remote?: string;
  skipPrompts?: boolean;
  /** Factory for the git runner; tests substitute a fake */
  createGit?: (cwd: string) => IGitRunner;
}

export interface InitGitResult {
  initialized: boolean;
  remote?: string;
  warnings: string[];
}

export interface InitResult {
  root: string;
  config: JournalConfig;
  configPath: string;
  entriesDir: string;
  aggregatePath: string;
  pointerPath: string;
  git: InitGitResult;
}

interface InitAnswers {
  name: string;
  git: boolean;
  remote?: string;
}

/**
 * Fill in whatever the flags left open. Only called when prompts are allowed.
 */
async function promptAnswers(options: InitOptions): Promise<InitAnswers> {
  const { input, confirm } = await import('@inquirer/prompts');

  const name = options.name ?? await input({
    message: 'Journal root folder name:',
    default: DEFAULT_JOURNAL_NAME,
  });

  const git = options.git ?? await confirm({
    message: 'Initialize a Git repository?',
    default: true,
  });

  let remote = options.remote;
  if (git && remote === undefined) {
    remote = await input({ message: 'Remote URL (optional):', default: '' });
  }

  return { name, git, remote };
}

function setUpGit(git: IGitRunner, remote: string | undefined): InitGitResult {
  const result: InitGitResult = { initialized: false, warnings: [] };

  const init = git.run(['init']);
  if (!init.ok) {
    const warning = `git init failed: ${init.output}`;
    logger.warn(warning);
    result.warnings.push(warning);
    return result;
  }
  result.initialized = true;

  if (remote) {
    const added = git.run(['remote', 'add', 'origin', remote]);
    if (added.ok) {
      result.remote = remote;
    } else {
      const warning = `Failed to add remote "${remote}": ${added.output}`;
      logger.warn(warning);
      result.warnings.push(warning);
    }
  }

  return result;
}

/**
 * Scaffold a new journal.
 *
 * Flow:
 * 1. Ask for folder name, git and remote (unless skipped)
 * 2. Refuse an existing target directory
 * 3. Create the root and entry directories
 * 4. Write .jlog/config.json and an empty aggregate document
 * 5. Point ~/.jlog/root.json at the new journal
 * 6. Optionally git init and add the origin remote
 */
export async function handleInit(options: InitOptions): Promise<InitResult> {
  const answers: InitAnswers = options.skipPrompts
    ? { name: options.name ?? DEFAULT_JOURNAL_NAME, git: options.git ?? false, remote: options.remote }
    : await promptAnswers(options);

  const root = resolve(options.cwd, answers.name.trim() || DEFAULT_JOURNAL_NAME);
  if (existsSync(root)) {
    throw new JournalExistsError(root);
  }

  const parsed = JournalConfigSchema.safeParse(options.categories ? { categories: options.categories } : {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid journal config: ${describeIssues(parsed.error)}`, parsed.error.issues);
  }
  const config = parsed.data;
  const entriesDir = resolve(root, config.entriesDir);
  const aggregatePath = resolve(root, config.aggregateFile);

  mkdirSync(entriesDir, { recursive: true });
  saveJournalConfig(root, config);
  writeFileSync(
    aggregatePath,
    renderAggregateDocument(config.categories.map((category) => ({ category, records: [] }))),
    'utf-8',
  );
  saveRootPointer(root);
  logger.debug('Journal scaffolded', { root });

  let git: InitGitResult = { initialized: false, warnings: [] };
  if (answers.git) {
    const createGit = options.createGit ?? ((cwd: string) => new GitRunner(cwd));
    git = setUpGit(createGit(root), answers.remote?.trim() || undefined);
  }

  return {
    root,
    config,
    configPath: journalConfigPath(root),
    entriesDir,
    aggregatePath,
    pointerPath: rootPointerPath(),
    git,
  };
}
