export type GitStep = 'add' | 'commit' | 'push';

export interface GitResult {
  ok: boolean;
  /** stdout on success, stderr (or the spawn error) on failure */
  output: string;
}

export interface GitStepOutcome {
  step: GitStep;
  ok: boolean;
  output: string;
  /** Human-readable note, e.g. "nothing to commit" or "pushed with upstream main" */
  detail?: string;
}
