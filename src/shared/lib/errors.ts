export class JlogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JlogError';
  }
}

export class ConfigNotFoundError extends JlogError {
  constructor(detail: string) {
    super(`No journal configured: ${detail}. Run "jlog init" to create one.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class JournalNotFoundError extends JlogError {
  constructor(public readonly path: string) {
    super(`Journal directory "${path}" does not exist. Run "jlog init" first.`);
    this.name = 'JournalNotFoundError';
  }
}

export class JournalExistsError extends JlogError {
  constructor(public readonly path: string) {
    super(`Directory "${path}" already exists. Choose another journal folder name.`);
    this.name = 'JournalExistsError';
  }
}

export class ValidationError extends JlogError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EntryAlreadyExistsError extends JlogError {
  constructor(public readonly path: string) {
    super(`Entry already exists: ${path}`);
    this.name = 'EntryAlreadyExistsError';
  }
}

export class EntryStoreError extends JlogError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'EntryStoreError';
  }
}

export class NotAGitRepositoryError extends JlogError {
  constructor(path: string) {
    super(`"${path}" is not a git repository. Run "git init" there or re-run "jlog init" with --git.`);
    this.name = 'NotAGitRepositoryError';
  }
}

export class GitCommandError extends JlogError {
  constructor(
    public readonly args: string[],
    public readonly output: string,
  ) {
    super(`git ${args.join(' ')} failed${output ? `: ${output}` : ''}`);
    this.name = 'GitCommandError';
  }
}
