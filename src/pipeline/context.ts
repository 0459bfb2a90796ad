/**
 * Per-run state shared by the pipeline stages.
 *
 * @packageDocumentation
 */

import { SystemGrouper, type AliasEntry, type StarRecord } from '../catalog/index.js';
import type { Config, DistanceConfig } from '../config/index.js';
import { getDefaultConfig } from '../config/index.js';
import type { DistancePolicy } from '../resolve/index.js';
import { silentLogger, type LogSink } from '../utils/logger.js';
import { createSeededRandom, defaultRandom, type RandomSource } from '../utils/random.js';

/**
 * Why a source row produced no star.
 */
export type SkipReason =
  | 'too_few_fields'
  | 'missing_name'
  | 'section_marker'
  | 'missing_distance'
  | 'beyond_max_distance';

/**
 * Counters collected while building a catalog.
 */
export interface PipelineStats {
  /** Non-blank lines after the header rows. */
  rowsRead: number;
  /** Rows that became star records, before deduplication. */
  starsAccepted: number;
  skipped: Record<SkipReason, number>;
  /** Stars placed with the random fallback because coordinates did not parse. */
  randomPositions: number;
  /** Stars that received the default spectral class. */
  defaultedClasses: number;
  fillerStars: number;
}

/**
 * Everything a run needs: settings, randomness, logging and accumulated state.
 */
export interface PipelineContext {
  readonly config: Config;
  readonly policy: DistancePolicy;
  readonly rng: RandomSource;
  readonly logger: LogSink;
  readonly aliases: readonly AliasEntry[] | undefined;
  readonly grouper: SystemGrouper;
  /** Accepted records in file order. */
  readonly records: StarRecord[];
  readonly stats: PipelineStats;
}

/**
 * Options for {@link createPipelineContext}.
 */
export interface PipelineContextOptions {
  /** Overrides the seed-derived random source. */
  readonly rng?: RandomSource;
  readonly logger?: LogSink;
  /** Replaces the canonical alias table. */
  readonly aliases?: readonly AliasEntry[];
}

/**
 * Converts the `[distance]` section into a resolver policy.
 */
export function toDistancePolicy(distance: DistanceConfig): DistancePolicy {
  return {
    parsecThreshold: distance.parsec_threshold,
    smallValueEpsilon: distance.small_value_epsilon,
    requireExplicitMarker: distance.require_explicit_marker,
  };
}

/**
 * Returns zeroed statistics.
 */
export function createEmptyStats(): PipelineStats {
  return {
    rowsRead: 0,
    starsAccepted: 0,
    skipped: {
      too_few_fields: 0,
      missing_name: 0,
      section_marker: 0,
      missing_distance: 0,
      beyond_max_distance: 0,
    },
    randomPositions: 0,
    defaultedClasses: 0,
    fillerStars: 0,
  };
}

/**
 * Creates the context for one run.
 *
 * The random source is seeded from `catalog.seed` when set, and unseeded
 * otherwise, unless `options.rng` is given.
 *
 * @param config - Effective configuration (defaults when omitted).
 * @param options - Injected collaborators.
 * @returns A fresh context.
 */
export function createPipelineContext(
  config: Config = getDefaultConfig(),
  options: PipelineContextOptions = {}
): PipelineContext {
  const logger = options.logger ?? silentLogger;
  const seed = config.catalog.seed;
  const rng = options.rng ?? (seed !== undefined ? createSeededRandom(seed) : defaultRandom);

  return {
    config,
    policy: toDistancePolicy(config.distance),
    rng,
    logger,
    aliases: options.aliases,
    grouper: new SystemGrouper({ logger, aliases: options.aliases }),
    records: [],
    stats: createEmptyStats(),
  };
}
