/**
 * Final catalog assembly: deduplication, the Sol anchor, ordering, padding
 * with filler stars, and companion-mapping cleanup.
 *
 * @packageDocumentation
 */

import { distanceFromOrigin, randomPointOnSphere } from '../resolve/index.js';
import { synthesizeProperties, type SpectralLetter } from '../stellar/index.js';
import { silentLogger, type LogSink } from '../utils/logger.js';
import {
  randomInt,
  weightedChoice,
  type RandomSource,
  type WeightedEntry,
} from '../utils/random.js';
import { CANONICAL_ALIASES, forcedCompanions, type AliasEntry } from './aliases.js';
import type { Catalog, CompanionMapping, StarRecord } from './types.js';

/**
 * Reference record for the Sun, always at the origin.
 */
export const SOL_REFERENCE: StarRecord = {
  name: 'Sol',
  position: { x: 0, y: 0, z: 0 },
  spectralClass: 'G2V',
  mass: 1.0,
  temperature: 5778,
  luminosity: 1.0,
  absoluteMagnitude: 4.83,
  procedural: false,
};

/**
 * Spectral type mix of the solar neighbourhood, used for filler stars.
 */
export const FILLER_CLASS_WEIGHTS: readonly WeightedEntry<SpectralLetter>[] = [
  { value: 'M', weight: 0.765 },
  { value: 'K', weight: 0.121 },
  { value: 'G', weight: 0.076 },
  { value: 'F', weight: 0.03 },
  { value: 'A', weight: 0.006 },
  { value: 'D', weight: 0.001 },
  { value: 'B', weight: 0.001 },
];

/**
 * Options for {@link assembleCatalog}.
 */
export interface AssembleOptions {
  /** Light-years; filler stars are placed inside this radius. */
  readonly maxDistance: number;
  /** Pad with filler stars up to this many records. 0 or absent disables padding. */
  readonly targetSize?: number;
  readonly rng: RandomSource;
  readonly aliases?: readonly AliasEntry[];
  readonly logger?: LogSink;
}

/**
 * Generates one filler star.
 *
 * Distance is `cbrt(u) * maxDistance` so stars are uniform by volume.
 *
 * @param name - Name for the star.
 * @param maxDistance - Radius of the sampled ball in light-years.
 * @param rng - Random source.
 * @returns A procedural star record.
 */
export function generateFillerStar(
  name: string,
  maxDistance: number,
  rng: RandomSource
): StarRecord {
  const distance = Math.cbrt(rng()) * maxDistance;
  const position = randomPointOnSphere(distance, rng);
  const letter = weightedChoice(rng, FILLER_CLASS_WEIGHTS);
  const subclass = randomInt(rng, 0, 9);
  const spectralClass = `${letter}${String(subclass)}${letter === 'D' ? '' : 'V'}`;
  const properties = synthesizeProperties(spectralClass, rng);

  return {
    name,
    position,
    spectralClass,
    mass: properties.mass,
    temperature: properties.temperature,
    luminosity: properties.luminosity,
    absoluteMagnitude: properties.absoluteMagnitude,
    procedural: true,
  };
}

/**
 * Yields `Star-0001`, `Star-0002`, ... skipping names already in use.
 */
function* fillerNames(taken: ReadonlySet<string>): Generator<string> {
  for (let index = 1; ; index++) {
    const name = `Star-${String(index).padStart(4, '0')}`;
    if (!taken.has(name)) {
      yield name;
    }
  }
}

/**
 * Keeps the first record for each name.
 */
function dedupeByName(records: readonly StarRecord[], logger: LogSink): StarRecord[] {
  const seen = new Set<string>();
  const unique: StarRecord[] = [];
  for (const record of records) {
    if (seen.has(record.name)) {
      logger.warn('duplicate_star_dropped', { name: record.name });
      continue;
    }
    seen.add(record.name);
    unique.push(record);
  }
  return unique;
}

/**
 * Replaces any Sol record with the reference, or inserts it at the front.
 */
function anchorSol(records: StarRecord[]): StarRecord[] {
  const index = records.findIndex((record) => record.name === SOL_REFERENCE.name);
  if (index === -1) {
    return [SOL_REFERENCE, ...records];
  }
  const anchored = records.slice();
  anchored[index] = SOL_REFERENCE;
  return anchored;
}

/**
 * Drops mappings whose companion or primary is missing, and self-mappings.
 *
 * @param mapping - Candidate mappings.
 * @param names - Names present in the catalog.
 * @returns The retained mappings.
 */
export function filterCompanionMapping(
  mapping: CompanionMapping,
  names: ReadonlySet<string>
): Map<string, string> {
  const retained = new Map<string, string>();
  for (const [companion, primary] of mapping) {
    if (companion !== primary && names.has(companion) && names.has(primary)) {
      retained.set(companion, primary);
    }
  }
  return retained;
}

/**
 * Assembles the final catalog.
 *
 * Real stars are deduplicated, anchored on Sol and sorted by distance from
 * the origin (stable, so ties keep insertion order). Filler stars, when a
 * target size is set and not reached, are appended after them.
 *
 * @param records - Star records in insertion order.
 * @param companions - Companion mappings from the Grouper.
 * @param options - Assembly options.
 * @returns The catalog and its cleaned companion mapping.
 */
export function assembleCatalog(
  records: readonly StarRecord[],
  companions: CompanionMapping,
  options: AssembleOptions
): Catalog {
  const logger = options.logger ?? silentLogger;

  const real = anchorSol(dedupeByName(records, logger)).sort(
    (a, b) => distanceFromOrigin(a.position) - distanceFromOrigin(b.position)
  );

  const stars: StarRecord[] = [...real];
  const targetSize = options.targetSize ?? 0;
  if (targetSize > stars.length) {
    const names = fillerNames(new Set(stars.map((star) => star.name)));
    const missing = targetSize - stars.length;
    for (let i = 0; i < missing; i++) {
      const next = names.next();
      if (next.done === true) {
        break;
      }
      stars.push(generateFillerStar(next.value, options.maxDistance, options.rng));
    }
    logger.info('catalog_padded', { realStars: real.length, fillerStars: missing, targetSize });
  }

  const candidates = new Map(companions);
  for (const [companion, primary] of forcedCompanions(options.aliases ?? CANONICAL_ALIASES)) {
    candidates.set(companion, primary);
  }

  const names = new Set(stars.map((star) => star.name));
  const retained = filterCompanionMapping(candidates, names);
  const dropped = candidates.size - retained.size;
  if (dropped > 0) {
    logger.debug('companion_mappings_dropped', { dropped });
  }

  return { stars, companions: retained };
}
