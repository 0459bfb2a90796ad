/**
 * Catalog model, grouping, assembly and output.
 *
 * @packageDocumentation
 */

export type { Catalog, CatalogRow, CompanionMapping, StarRecord } from './types.js';
export { CANONICAL_ALIASES, forcedCompanions, resolveAlias } from './aliases.js';
export type { AliasEntry, AliasResolution } from './aliases.js';
export { SystemGrouper, isLetteredDesignation } from './grouper.js';
export type {
  ResolvedStarName,
  SystemContext,
  SystemFallbacks,
  SystemGrouperOptions,
} from './grouper.js';
export {
  FILLER_CLASS_WEIGHTS,
  SOL_REFERENCE,
  assembleCatalog,
  filterCompanionMapping,
  generateFillerStar,
} from './assembler.js';
export type { AssembleOptions } from './assembler.js';
export {
  CATALOG_COLUMNS,
  CATALOG_PRECISION,
  COMPANION_COLUMNS,
  VISUALIZATION_COLUMNS,
  formatCatalogCsv,
  formatCompanionCsv,
  formatVisualizationCsv,
  roundTo,
  toVisualizationRows,
} from './writer.js';
export type { VisualizationRow } from './writer.js';
export { CatalogIoError, readCatalogFile, writeCatalogOutputs } from './io.js';
export type { OutputTargets, WrittenOutputs } from './io.js';
