/**
 * File system helpers shared by configuration loading and endpoint handling.
 */

import { lstat, readFile, rm } from 'node:fs/promises';

/**
 * Error thrown when a file operation fails.
 */
export class FsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FsError';
  }
}

/**
 * Returns the errno code carried by an error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * True when the error is an ENOENT from the file system.
 */
export function isNotFound(error: unknown): boolean {
  if (error instanceof FsError) {
    return errnoCode(error.cause) === 'ENOENT';
  }
  return errnoCode(error) === 'ENOENT';
}

/**
 * Reads and parses a JSON file.
 *
 * @throws {FsError} If the file cannot be read or parsed. The original error
 *   (errno error or SyntaxError) is kept as `cause`.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new FsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Removes a file if it exists. Symlinks are removed, not followed. Missing
 * files are not an error.
 *
 * @returns true if a file was removed
 * @throws {FsError} If the file exists but cannot be removed
 */
export async function removeIfPresent(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw new FsError(
      `Failed to inspect ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  try {
    await rm(filePath, { force: true });
    return true;
  } catch (error) {
    throw new FsError(
      `Failed to remove ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
