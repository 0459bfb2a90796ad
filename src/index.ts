/**
 * stellar-catalog
 *
 * Builds a heliocentric 3D catalog of nearby stars, with synthesized
 * physical properties and companion-to-primary mappings, from a
 * hand-maintained reference list.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export { normalizeText, ENCODING_REPAIRS } from './normalize/index.js';
export type { TextRepair } from './normalize/index.js';

export {
  DEFAULT_DISTANCE_POLICY,
  PARSEC_IN_LIGHT_YEARS,
  distanceFromOrigin,
  extractDistanceValue,
  fromCartesian,
  hasParsecMarker,
  parseCoordinates,
  randomPointOnSphere,
  resolveDistance,
  toCartesian,
} from './resolve/index.js';
export type {
  DistancePolicy,
  EquatorialCoordinates,
  SphericalPosition,
  Vector3,
} from './resolve/index.js';

export {
  DEFAULT_SPECTRAL_CLASS,
  SPECTRAL_RANGES,
  drawProperties,
  interpolateProperties,
  parseSpectralClass,
  synthesizeProperties,
} from './stellar/index.js';
export type {
  SpectralClassification,
  SpectralLetter,
  SpectralRanges,
  StellarProperties,
  SynthesizedStar,
} from './stellar/index.js';

export { decodeCatalogBuffer, readCatalogRows, splitCatalogLine } from './ingest/index.js';
export type { CatalogReadResult, ReadCatalogOptions } from './ingest/index.js';

export {
  CANONICAL_ALIASES,
  CatalogIoError,
  SOL_REFERENCE,
  SystemGrouper,
  assembleCatalog,
  formatCatalogCsv,
  formatCompanionCsv,
  formatVisualizationCsv,
  generateFillerStar,
  resolveAlias,
  toVisualizationRows,
  writeCatalogOutputs,
} from './catalog/index.js';
export type {
  AliasEntry,
  AssembleOptions,
  Catalog,
  CatalogRow,
  CompanionMapping,
  StarRecord,
  VisualizationRow,
} from './catalog/index.js';

export {
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from './config/index.js';
export type { Config, PartialConfig } from './config/index.js';

export { buildCatalog, createPipelineContext, runCatalogBuild } from './pipeline/index.js';
export type {
  BuildCatalogOptions,
  CatalogBuildResult,
  CatalogRunResult,
  PipelineStats,
} from './pipeline/index.js';

export { Logger } from './utils/logger.js';
export type { LogSink } from './utils/logger.js';
export { createSeededRandom, defaultRandom } from './utils/random.js';
export type { RandomSource } from './utils/random.js';
