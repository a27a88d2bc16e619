import type { GitResult } from '@domain/types/git.js';

/**
 * Port interface for running git inside the journal root.
 * Each call blocks until git exits; there is no timeout.
 */
export interface IGitRunner {
  run(args: string[]): GitResult;
  isRepository(): boolean;
}
