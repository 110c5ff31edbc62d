/**
 * File system helpers with path validation and atomic writes.
 *
 * Every path is resolved to an absolute path and rejected when empty or when it
 * carries null bytes, before any file system call is made.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

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
 * Validates and resolves a file system path.
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

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Checks whether a path exists.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory and its parents.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Lists the entry names of a directory.
 */
export async function safeReaddir(dirPath: string): Promise<string[]> {
  const validatedPath = validatePath(dirPath);
  return fs.readdir(validatedPath);
}

/**
 * Writes a text file atomically.
 *
 * The content goes to a hidden temp file beside the target which is then
 * renamed over it, so readers never observe a partial file. Parent
 * directories are created when missing.
 *
 * @param filePath - Target path.
 * @param content - UTF-8 content.
 * @param tempPrefix - Prefix of the temp file name.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written; the temp file is removed first.
 */
export async function safeWriteFileAtomic(
  filePath: string,
  content: string,
  tempPrefix = 'write'
): Promise<void> {
  const validatedPath = validatePath(filePath);
  const directory = path.dirname(validatedPath);
  const tempPath = path.join(directory, `.${tempPrefix}-${randomUUID()}.tmp`);

  await fs.mkdir(directory, { recursive: true });

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, validatedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
