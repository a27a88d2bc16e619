import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';

export class JsonStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'JsonStoreError';
  }
}

/** `path: message` per issue, joined with `; `. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Typed JSON file persistence for the journal config and the root pointer.
 * Every read and write goes through a Zod schema.
 */
export const JsonStore = {
  /**
   * Read a JSON file and validate it, applying schema defaults.
   * @throws JsonStoreError if the file is missing, not JSON, or invalid
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      throw new JsonStoreError(`File not found: ${path}`, path);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const reason = err instanceof SyntaxError ? 'Invalid JSON in file' : 'Failed to read file';
      throw new JsonStoreError(`${reason}: ${path}`, path, err);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new JsonStoreError(`Invalid ${path}: ${describeIssues(result.error)}`, path, result.error);
    }
    return result.data;
  },

  /** Validate and write pretty-printed JSON, creating parent directories. */
  write<T>(path: string, data: T, schema: z.ZodType<T>): void {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new JsonStoreError(`Refusing to write invalid ${path}: ${describeIssues(result.error)}`, path, result.error);
    }

    JsonStore.ensureDir(dirname(path));
    try {
      writeFileSync(path, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
    } catch (err) {
      throw new JsonStoreError(`Failed to write file: ${path}`, path, err);
    }
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  /** Create directory and all parents if they don't exist */
  ensureDir(dir: string): void {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  },
};
