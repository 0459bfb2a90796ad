/**
 * End-to-end catalog pipeline.
 *
 * @packageDocumentation
 */

export { createEmptyStats, createPipelineContext, toDistancePolicy } from './context.js';
export type {
  PipelineContext,
  PipelineContextOptions,
  PipelineStats,
  SkipReason,
} from './context.js';
export { SECTION_MARKER, buildCatalog, processRow } from './build.js';
export type { BuildCatalogOptions, CatalogBuildResult, RowOutcome } from './build.js';
export { runCatalogBuild } from './run.js';
export type { CatalogRunResult } from './run.js';
