/**
 * The catalog build: rows in, assembled catalog and statistics out.
 *
 * @packageDocumentation
 */

import {
  assembleCatalog,
  type Catalog,
  type CatalogRow,
  type StarRecord,
} from '../catalog/index.js';
import type { Config } from '../config/index.js';
import { readCatalogRows } from '../ingest/index.js';
import { normalizeText } from '../normalize/index.js';
import {
  parseCoordinates,
  randomPointOnSphere,
  resolveDistance,
  toCartesian,
  type Vector3,
} from '../resolve/index.js';
import { synthesizeProperties } from '../stellar/index.js';
import {
  createPipelineContext,
  type PipelineContext,
  type PipelineContextOptions,
  type PipelineStats,
  type SkipReason,
} from './context.js';

/**
 * Names containing this mark a section divider rather than a star.
 */
export const SECTION_MARKER = '10 parsecs';

/**
 * Options for {@link buildCatalog}.
 */
export interface BuildCatalogOptions extends PipelineContextOptions {
  /** Effective configuration (defaults when omitted). */
  readonly config?: Config;
}

/**
 * An assembled catalog with the statistics of the run that produced it.
 */
export interface CatalogBuildResult extends Catalog {
  readonly stats: PipelineStats;
}

/**
 * Outcome of a single row.
 */
export type RowOutcome =
  | { readonly kind: 'accepted'; readonly record: StarRecord }
  | { readonly kind: 'skipped'; readonly reason: SkipReason };

function skip(context: PipelineContext, row: CatalogRow, reason: SkipReason): RowOutcome {
  context.stats.skipped[reason]++;
  context.logger.debug('row_skipped', { line: row.line, reason });
  return { kind: 'skipped', reason };
}

function placeStar(
  context: PipelineContext,
  row: CatalogRow,
  name: string,
  distance: number
): Vector3 {
  const coordinates = parseCoordinates(row.coordinates);
  if (coordinates !== null) {
    return toCartesian(coordinates.raHours, coordinates.decDegrees, distance);
  }

  context.stats.randomPositions++;
  context.logger.debug('position_randomized', { line: row.line, name });
  return randomPointOnSphere(distance, context.rng);
}

/**
 * Runs one row through the core stages and records the star it yields.
 *
 * A non-empty system column opens a new system before the name is looked at,
 * so a header row without a star still supplies fallbacks to the rows after it.
 *
 * @param context - Run state; mutated.
 * @param row - Row as read from the source.
 * @returns Whether the row became a star, and why not.
 */
export function processRow(context: PipelineContext, row: CatalogRow): RowOutcome {
  const { grouper, policy } = context;

  const system = normalizeText(row.system);
  const name = normalizeText(row.name);
  const spectralClass = normalizeText(row.spectralClass);

  if (system !== '') {
    grouper.openSystem(system, {
      distance: resolveDistance(row.distance, policy),
      spectralClass,
    });
  }

  if (name === '') {
    return skip(context, row, 'missing_name');
  }
  if (name.includes(SECTION_MARKER)) {
    return skip(context, row, 'section_marker');
  }

  const resolved = grouper.resolveName(name);
  const fallbacks = grouper.context;

  const distance = resolveDistance(row.distance, policy) ?? fallbacks?.distance ?? null;
  if (distance === null) {
    return skip(context, row, 'missing_distance');
  }
  if (distance > context.config.distance.max_distance_ly) {
    return skip(context, row, 'beyond_max_distance');
  }

  const position = placeStar(context, row, resolved.name, distance);

  const requestedClass = spectralClass !== '' ? spectralClass : (fallbacks?.spectralClass ?? '');
  const properties = synthesizeProperties(
    requestedClass,
    context.rng,
    context.config.catalog.default_spectral_class
  );
  if (properties.defaulted) {
    context.stats.defaultedClasses++;
    context.logger.debug('spectral_class_defaulted', {
      line: row.line,
      name: resolved.name,
      requested: requestedClass,
      used: properties.spectralClass,
    });
  }

  const record: StarRecord = {
    name: resolved.name,
    position,
    spectralClass: properties.spectralClass,
    mass: properties.mass,
    temperature: properties.temperature,
    luminosity: properties.luminosity,
    absoluteMagnitude: properties.absoluteMagnitude,
    procedural: false,
  };

  context.records.push(record);
  context.stats.starsAccepted++;
  grouper.recordStar(resolved);

  return { kind: 'accepted', record };
}

/**
 * Builds a catalog from decoded source text.
 *
 * @param text - Decoded catalog text with `\n` line endings.
 * @param options - Configuration and injected collaborators.
 * @returns Stars in output order, companion mappings and run statistics.
 *
 * @example
 * ```typescript
 * const result = buildCatalog(decodeCatalogBuffer(bytes), {
 *   config,
 *   rng: createSeededRandom(7),
 * });
 * console.log(result.stars.length, result.stats.randomPositions);
 * ```
 */
export function buildCatalog(text: string, options: BuildCatalogOptions = {}): CatalogBuildResult {
  const context = createPipelineContext(options.config, options);
  const { config, logger, stats } = context;

  const read = readCatalogRows(text, { headerRows: config.catalog.header_rows, logger });
  stats.rowsRead = read.dataLines;
  stats.skipped.too_few_fields = read.tooFewFields;

  for (const row of read.rows) {
    processRow(context, row);
  }

  const catalog = assembleCatalog(context.records, context.grouper.finish(), {
    maxDistance: config.distance.max_distance_ly,
    targetSize: config.catalog.target_size,
    rng: context.rng,
    aliases: context.aliases,
    logger,
  });
  stats.fillerStars = catalog.stars.filter((star) => star.procedural).length;

  logger.info('catalog_built', {
    stars: catalog.stars.length,
    companions: catalog.companions.size,
    rowsRead: stats.rowsRead,
    skipped: stats.skipped,
    randomPositions: stats.randomPositions,
    defaultedClasses: stats.defaultedClasses,
    fillerStars: stats.fillerStars,
  });

  return { stars: catalog.stars, companions: catalog.companions, stats };
}
