/**
 * Whole-file input and output for catalog runs.
 *
 * Failures here are fatal: they surface as {@link CatalogIoError}.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { probeWritableDirectory, safeReadBytes, safeWriteText } from '../utils/safe-fs.js';
import type { Catalog } from './types.js';
import { formatCatalogCsv, formatCompanionCsv, formatVisualizationCsv } from './writer.js';

/**
 * Error raised when the input cannot be read or the outputs cannot be written.
 */
export class CatalogIoError extends Error {
  /** Which side of the run failed. */
  public readonly operation: 'read' | 'write';
  /** Path involved in the failure. */
  public readonly path: string;
  /** The underlying error, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new CatalogIoError.
   *
   * @param message - Descriptive error message.
   * @param operation - Whether reading or writing failed.
   * @param path - Path involved in the failure.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, operation: 'read' | 'write', path: string, cause?: Error) {
    super(message);
    this.name = 'CatalogIoError';
    this.operation = operation;
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Where a run writes its outputs.
 */
export interface OutputTargets {
  /** Existing directory; it is never created. */
  readonly outputDir: string;
  readonly catalogFile: string;
  readonly companionsFile: string;
  /** Written only when set. */
  readonly visualizationFile?: string | undefined;
}

/**
 * Paths written by {@link writeCatalogOutputs}.
 */
export interface WrittenOutputs {
  readonly catalogPath: string;
  readonly companionsPath: string;
  readonly visualizationPath: string | undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reads the source catalog as raw bytes.
 *
 * @param filePath - Catalog file.
 * @returns File contents.
 * @throws CatalogIoError if the file cannot be read.
 */
export async function readCatalogFile(filePath: string): Promise<Buffer> {
  try {
    return await safeReadBytes(filePath);
  } catch (error) {
    const cause = toError(error);
    throw new CatalogIoError(
      `Cannot read catalog '${filePath}': ${cause.message}`,
      'read',
      filePath,
      cause
    );
  }
}

const DIRECTORY_PROBLEMS = {
  missing: 'does not exist',
  not_directory: 'is not a directory',
  not_writable: 'is not writable',
} as const;

/**
 * Writes the catalog, the companion mapping and optionally the visualization file.
 *
 * @param catalog - Assembled catalog.
 * @param targets - Output directory and file names.
 * @returns Absolute paths of the written files.
 * @throws CatalogIoError if the directory is unusable or a write fails.
 */
export async function writeCatalogOutputs(
  catalog: Catalog,
  targets: OutputTargets
): Promise<WrittenOutputs> {
  let probe: Awaited<ReturnType<typeof probeWritableDirectory>>;
  try {
    probe = await probeWritableDirectory(targets.outputDir);
  } catch (error) {
    const cause = toError(error);
    throw new CatalogIoError(
      `Invalid output directory '${targets.outputDir}': ${cause.message}`,
      'write',
      targets.outputDir,
      cause
    );
  }

  if (!probe.ok) {
    throw new CatalogIoError(
      `Output directory '${probe.path}' ${DIRECTORY_PROBLEMS[probe.reason]}`,
      'write',
      probe.path
    );
  }

  const catalogPath = join(probe.path, targets.catalogFile);
  const companionsPath = join(probe.path, targets.companionsFile);
  const visualizationPath =
    targets.visualizationFile !== undefined
      ? join(probe.path, targets.visualizationFile)
      : undefined;

  await writeText(catalogPath, formatCatalogCsv(catalog.stars));
  await writeText(companionsPath, formatCompanionCsv(catalog.companions));
  if (visualizationPath !== undefined) {
    await writeText(visualizationPath, formatVisualizationCsv(catalog.stars));
  }

  return { catalogPath, companionsPath, visualizationPath };
}

async function writeText(filePath: string, text: string): Promise<void> {
  try {
    await safeWriteText(filePath, text);
  } catch (error) {
    const cause = toError(error);
    throw new CatalogIoError(
      `Cannot write '${filePath}': ${cause.message}`,
      'write',
      filePath,
      cause
    );
  }
}
