import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { JsonStore } from '@infra/persistence/json-store.js';
import { JournalConfigSchema, RootPointerSchema, type JournalConfig } from '@domain/types/config.js';
import { JLOG_DIRS } from '@shared/constants/paths.js';
import { ConfigNotFoundError, JournalNotFoundError, ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface ResolvedJournal {
  root: string;
  config: JournalConfig;
  /** Absolute entry directory */
  entriesDir: string;
  /** Absolute aggregate document path */
  aggregatePath: string;
}

/** Home directory holding `.jlog/root.json`; JLOG_HOME overrides it. */
export function jlogHome(): string {
  return process.env['JLOG_HOME'] ?? homedir();
}

export function rootPointerPath(): string {
  return join(jlogHome(), JLOG_DIRS.root, JLOG_DIRS.pointer);
}

export function journalConfigPath(root: string): string {
  return join(root, JLOG_DIRS.root, JLOG_DIRS.config);
}

export function readRootPointer(): string | null {
  const path = rootPointerPath();
  if (!JsonStore.exists(path)) return null;
  return JsonStore.read(path, RootPointerSchema).root;
}

export function saveRootPointer(root: string): void {
  JsonStore.write(rootPointerPath(), { root: resolve(root) }, RootPointerSchema);
}

export function saveJournalConfig(root: string, config: JournalConfig): void {
  JsonStore.write(journalConfigPath(root), config, JournalConfigSchema);
}

/**
 * Read `.jlog/config.json` under the journal root.
 * Throws ConfigNotFoundError when the file is absent and JsonStoreError when it is malformed.
 */
export function loadJournalConfig(root: string): JournalConfig {
  const path = journalConfigPath(root);
  if (!JsonStore.exists(path)) {
    throw new ConfigNotFoundError(`${path} is missing`);
  }
  return JsonStore.read(path, JournalConfigSchema);
}

/**
 * Pick the journal root: explicit `--root`, then JLOG_ROOT, then the home pointer
 * written by `jlog init`. The directory must exist.
 */
export function resolveJournalRoot(explicit?: string): string {
  const envRoot = process.env['JLOG_ROOT'];
  let candidate: string | null;
  if (explicit) {
    candidate = explicit;
  } else if (envRoot) {
    candidate = envRoot;
  } else {
    candidate = readRootPointer();
  }
  if (!candidate) {
    throw new ConfigNotFoundError(`no --root option, JLOG_ROOT variable or ${rootPointerPath()}`);
  }

  const root = resolve(candidate);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new JournalNotFoundError(root);
  }
  logger.debug('Resolved journal root', { root });
  return root;
}

function isWithin(dir: string, target: string): boolean {
  const rel = relative(dir, target);
  return rel === '' || (!isAbsolute(rel) && rel.split(sep)[0] !== '..');
}

/**
 * Reject an aggregate path that would overwrite an entry or be overwritten
 * by the README overview.
 */
export function checkOutputPaths(journal: ResolvedJournal): void {
  const { root, config, entriesDir, aggregatePath } = journal;
  if (isWithin(entriesDir, aggregatePath)) {
    throw new ValidationError(
      `Invalid ${journalConfigPath(root)}: aggregateFile "${config.aggregateFile}" is inside the entries directory`,
      [{ path: 'aggregateFile', message: 'inside entriesDir' }],
    );
  }
  if (config.overview && aggregatePath === join(root, JLOG_DIRS.readme)) {
    throw new ValidationError(
      `Invalid ${journalConfigPath(root)}: aggregateFile "${config.aggregateFile}" is the overview README; ` +
        'pick another file or set "overview" to false',
      [{ path: 'aggregateFile', message: 'collides with the overview README' }],
    );
  }
}

export function openJournal(explicit?: string): ResolvedJournal {
  const root = resolveJournalRoot(explicit);
  const config = loadJournalConfig(root);
  const journal: ResolvedJournal = {
    root,
    config,
    entriesDir: resolve(root, config.entriesDir),
    aggregatePath: resolve(root, config.aggregateFile),
  };
  checkOutputPaths(journal);
  return journal;
}
