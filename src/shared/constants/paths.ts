export const JLOG_DIRS = {
  root: '.jlog',
  config: 'config.json',
  entries: 'entries',
  aggregate: 'aggregate.md',
  readme: 'README.md',
  /** Pointer file under the user's home directory naming the active journal */
  pointer: 'root.json',
} as const;

export const DEFAULT_JOURNAL_NAME = 'journal';

export const DEFAULT_CATEGORIES = [
  'What I accomplished',
  "What didn't go well / blockers",
  'What I learned',
  'What to improve',
] as const;

export const TIME_TRACKING_HEADING = 'Time Tracking';
