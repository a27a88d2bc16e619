import { z } from 'zod/v4';
import { DEFAULT_CATEGORIES, JLOG_DIRS, TIME_TRACKING_HEADING } from '@shared/constants/paths.js';

export const CategoryNameSchema = z
  .string()
  .min(1)
  .refine((name) => name.trim() === name, { message: 'Category names must not have leading or trailing whitespace' })
  .refine((name) => !name.includes('\n'), { message: 'Category names must be a single line' })
  .refine((name) => name !== TIME_TRACKING_HEADING, {
    message: `"${TIME_TRACKING_HEADING}" is reserved for the time tracking section`,
  });

export const JournalConfigSchema = z.object({
  /**
   * Ordered category headings. Entries are split on `## <name>` lines that
   * match one of these exactly (case-sensitive), and the aggregate document
   * renders one table per category in this order.
   */
  categories: z
    .array(CategoryNameSchema)
    .min(1)
    .refine((names) => new Set(names).size === names.length, { message: 'Category names must be unique' })
    .default(() => [...DEFAULT_CATEGORIES]),
  /** Entry directory, relative to the journal root */
  entriesDir: z.string().min(1).default(JLOG_DIRS.entries),
  /** Aggregate document path, relative to the journal root */
  aggregateFile: z.string().min(1).default(JLOG_DIRS.aggregate),
  /** Add a Time Tracking section to new entries and report worked hours */
  timeTracking: z.boolean().default(true),
  /** Rewrite README.md with a journal overview on every aggregation */
  overview: z.boolean().default(true),
});

export type JournalConfig = z.infer<typeof JournalConfigSchema>;

/** Contents of ~/.jlog/root.json */
export const RootPointerSchema = z.object({
  root: z.string().min(1),
});

export type RootPointer = z.infer<typeof RootPointerSchema>;
