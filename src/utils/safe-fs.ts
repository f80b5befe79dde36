/**
 * Safe file system helpers with path validation.
 *
 * Every helper resolves and validates its path before touching the disk, so
 * an empty path or one carrying a null byte fails early with a
 * {@link PathValidationError} instead of an opaque errno.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates a file system path and resolves it to an absolute path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Returns true when an error is a missing-path errno.
 *
 * ENOTDIR is included because reading `a/b.csv` where `a` is a regular file
 * is just another way of the target not existing.
 */
export function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Reads a UTF-8 text file.
 *
 * @param filePath - The file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Reads a UTF-8 text file, resolving to `undefined` when the file or one of
 * its parent directories does not exist.
 *
 * @param filePath - The file to read.
 * @returns The file contents, or undefined when missing.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadTextFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await safeReadTextFile(filePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Appends UTF-8 text to a file, creating the file when needed.
 *
 * The whole chunk is handed to a single write call.
 *
 * @param filePath - The file to append to.
 * @param data - The text to append.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeAppendTextFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.appendFile(validatedPath, data, 'utf-8');
}

/**
 * Creates a directory and any missing parents.
 *
 * @param dirPath - The directory to create.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeMkdirp(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Synchronously checks whether a path exists.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}
