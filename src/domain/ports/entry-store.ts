import type { DateKey, EntryListing, EntryRef } from '@domain/types/journal.js';

/**
 * Port interface for the directory of dated markdown entries.
 * Features depend on this rather than on the filesystem-backed EntryStore.
 */
export interface IEntryStore {
  /** Entries in ascending date order plus rejected file names. */
  list(): EntryListing;
  read(entry: EntryRef): string;
  /** Create the entry exclusively; throws EntryAlreadyExistsError when present. */
  create(date: DateKey, content: string): string;
}
