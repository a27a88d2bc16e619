import { readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { IEntryStore } from '@domain/ports/entry-store.js';
import type { DateKey, EntryListing, EntryRef, SkippedFile } from '@domain/types/journal.js';
import { isDateKey } from '@shared/lib/dates.js';
import { EntryAlreadyExistsError, EntryStoreError, JournalNotFoundError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

const ENTRY_FILE_RE = /^(.+)\.md$/;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map an entry file name to its date key, or null when the name is not
 * `YYYY-MM-DD.md` for a real calendar date.
 */
export function dateKeyFromFileName(name: string): DateKey | null {
  const match = ENTRY_FILE_RE.exec(name);
  const key = match?.[1];
  return key !== undefined && isDateKey(key) ? key : null;
}

/**
 * Filesystem-backed store of daily entries: one `YYYY-MM-DD.md` per day,
 * flat in a single directory.
 */
export class EntryStore implements IEntryStore {
  constructor(private readonly entriesDir: string) {}

  private pathFor(date: DateKey): string {
    return join(this.entriesDir, `${date}.md`);
  }

  /**
   * List entries sorted by date. Names that do not map to a date key are
   * skipped with a warning; a missing or unreadable directory is fatal.
   */
  list(): EntryListing {
    let names: string[];
    try {
      names = readdirSync(this.entriesDir);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new JournalNotFoundError(this.entriesDir);
      }
      throw new EntryStoreError(`Cannot read entry directory ${this.entriesDir}: ${errorMessage(err)}`, this.entriesDir, err);
    }

    const entries: EntryRef[] = [];
    const skipped: SkippedFile[] = [];

    for (const name of names) {
      const path = join(this.entriesDir, name);
      if (isDirectory(path)) continue;

      const date = dateKeyFromFileName(name);
      if (date === null) {
        logger.warn(`Skipping "${name}": not a YYYY-MM-DD.md entry`, { file: path });
        skipped.push({ file: path, reason: 'unparsable file name' });
        continue;
      }
      entries.push({ date, path });
    }

    entries.sort((a, b) => a.date.localeCompare(b.date));
    return { entries, skipped };
  }

  read(entry: EntryRef): string {
    try {
      return readFileSync(entry.path, 'utf-8');
    } catch (err) {
      throw new EntryStoreError(`Cannot read ${entry.path}: ${errorMessage(err)}`, entry.path, err);
    }
  }

  create(date: DateKey, content: string): string {
    const path = this.pathFor(date);
    try {
      // 'wx' fails if the file exists
      writeFileSync(path, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      const code = errorCode(err);
      if (code === 'EEXIST') {
        throw new EntryAlreadyExistsError(path);
      }
      if (code === 'ENOENT') {
        throw new JournalNotFoundError(this.entriesDir);
      }
      throw new EntryStoreError(`Cannot create ${path}: ${errorMessage(err)}`, path, err);
    }
    return path;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    // Vanished or unstattable entries are reported when read
    return false;
  }
}
