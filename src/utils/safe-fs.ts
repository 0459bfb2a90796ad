/**
 * File system helpers that validate every path before touching the disk.
 *
 * Paths are resolved to absolute form and rejected when empty or when they
 * contain null bytes.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
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
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, not a string, or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

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
 * Reads a whole file as raw bytes after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadBytes(filePath: string): Promise<Buffer> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath);
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteText(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Outcome of probing a directory for writing.
 */
export type DirectoryProbe =
  | { readonly ok: true; readonly path: string }
  | {
      readonly ok: false;
      readonly path: string;
      readonly reason: 'missing' | 'not_directory' | 'not_writable';
    };

/**
 * Checks that a directory exists and the current process may write into it.
 *
 * Nothing is created.
 *
 * @param dirPath - Directory to probe.
 * @returns The resolved path and, on failure, why it cannot be used.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function probeWritableDirectory(dirPath: string): Promise<DirectoryProbe> {
  const validatedPath = validatePath(dirPath);

  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(validatedPath);
  } catch {
    return { ok: false, path: validatedPath, reason: 'missing' };
  }

  if (!stats.isDirectory()) {
    return { ok: false, path: validatedPath, reason: 'not_directory' };
  }

  try {
    await fs.access(validatedPath, fsConstants.W_OK);
  } catch {
    return { ok: false, path: validatedPath, reason: 'not_writable' };
  }

  return { ok: true, path: validatedPath };
}
