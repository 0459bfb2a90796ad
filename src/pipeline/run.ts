/**
 * File-to-file catalog runs.
 *
 * @packageDocumentation
 */

import { resolve } from 'node:path';
import { readCatalogFile, writeCatalogOutputs, type WrittenOutputs } from '../catalog/index.js';
import type { Config } from '../config/index.js';
import { decodeCatalogBuffer } from '../ingest/index.js';
import { buildCatalog, type CatalogBuildResult } from './build.js';
import type { PipelineContextOptions } from './context.js';

/**
 * Result of {@link runCatalogBuild}.
 */
export interface CatalogRunResult {
  readonly build: CatalogBuildResult;
  readonly outputs: WrittenOutputs;
}

/**
 * Reads the configured input, builds the catalog and writes the outputs.
 *
 * @param config - Effective configuration.
 * @param options - Injected collaborators.
 * @returns The built catalog and the paths written.
 * @throws CatalogIoError if the input is unreadable or the output directory is unusable.
 */
export async function runCatalogBuild(
  config: Config,
  options: PipelineContextOptions = {}
): Promise<CatalogRunResult> {
  const inputPath = resolve(config.paths.input);
  options.logger?.info('catalog_build_started', {
    input: inputPath,
    outputDir: resolve(config.paths.output_dir),
  });

  const text = decodeCatalogBuffer(await readCatalogFile(inputPath));
  const build = buildCatalog(text, { ...options, config });

  const outputs = await writeCatalogOutputs(build, {
    outputDir: config.paths.output_dir,
    catalogFile: config.paths.catalog_file,
    companionsFile: config.paths.companions_file,
    visualizationFile: config.catalog.emit_visualization
      ? config.paths.visualization_file
      : undefined,
  });

  options.logger?.info('catalog_written', {
    catalog: outputs.catalogPath,
    companions: outputs.companionsPath,
    ...(outputs.visualizationPath !== undefined
      ? { visualization: outputs.visualizationPath }
      : {}),
  });

  return { build, outputs };
}
