/**
 * Synthesizes illustrative physical properties from a spectral class.
 *
 * Values are draws from per-class ranges, not derived from stellar models.
 * With a numeric subclass the result is a pure function of the class; without
 * one each property is drawn independently from the injected random source.
 *
 * @packageDocumentation
 */

import { uniform, type RandomSource } from '../utils/random.js';
import {
  DEFAULT_SPECTRAL_CLASS,
  SPECTRAL_RANGES,
  parseSpectralClass,
  type Range,
  type SpectralLetter,
  type SpectralRanges,
} from './spectral.js';

/**
 * Synthesized physical properties of a star.
 */
export interface StellarProperties {
  /** Solar masses. */
  readonly mass: number;
  /** Kelvin, truncated to an integer. */
  readonly temperature: number;
  /** Solar luminosities. */
  readonly luminosity: number;
  readonly absoluteMagnitude: number;
}

/**
 * Properties together with the classification they were derived from.
 */
export interface SynthesizedStar extends StellarProperties {
  /** Classification actually used (the default when the input was unusable). */
  readonly spectralClass: string;
  readonly letter: SpectralLetter;
  /** True when the input was empty or unrecognised. */
  readonly defaulted: boolean;
}

function clamp(value: number, [low, high]: Range): number {
  return Math.min(high, Math.max(low, value));
}

function lerp([low, high]: Range, factor: number): number {
  return low + (high - low) * factor;
}

/**
 * Interpolates properties within a class by subclass.
 *
 * `factor = (9 - subclass) / 9`, so subclass 0 sits at the hot, massive end.
 * Luminosity is interpolated geometrically; magnitude runs from the faint end
 * at factor 0 to the bright end at factor 1.
 *
 * @param ranges - Ranges of the star's spectral type.
 * @param subclass - Subclass in `[0, 9]`.
 * @returns Deterministic properties inside `ranges`.
 */
export function interpolateProperties(ranges: SpectralRanges, subclass: number): StellarProperties {
  const factor = (9 - subclass) / 9;
  const [lumLow, lumHigh] = ranges.luminosity;
  const [magBright, magFaint] = ranges.absoluteMagnitude;

  return {
    mass: clamp(lerp(ranges.mass, factor), ranges.mass),
    temperature: Math.trunc(clamp(lerp(ranges.temperature, factor), ranges.temperature)),
    luminosity: clamp(lumLow * Math.pow(lumHigh / lumLow, factor), ranges.luminosity),
    absoluteMagnitude: clamp(
      magFaint + (magBright - magFaint) * factor,
      ranges.absoluteMagnitude
    ),
  };
}

/**
 * Draws each property independently and uniformly from its range.
 *
 * @param ranges - Ranges of the star's spectral type.
 * @param rng - Random source.
 * @returns Properties inside `ranges`.
 */
export function drawProperties(ranges: SpectralRanges, rng: RandomSource): StellarProperties {
  const draw = (range: Range): number => clamp(uniform(rng, range[0], range[1]), range);

  return {
    mass: draw(ranges.mass),
    temperature: Math.trunc(draw(ranges.temperature)),
    luminosity: draw(ranges.luminosity),
    absoluteMagnitude: draw(ranges.absoluteMagnitude),
  };
}

/**
 * Synthesizes properties for a spectral classification string.
 *
 * @param spectralClass - Classification from the catalog; may be empty.
 * @param rng - Random source for classes without a subclass digit.
 * @param defaultClass - Classification used for empty or unrecognised input.
 * @returns The properties and the classification they belong to.
 *
 * @example
 * ```typescript
 * const star = synthesizeProperties('G0V', rng);
 * // star.mass === 1.04, star.temperature === 6000
 * ```
 */
export function synthesizeProperties(
  spectralClass: string | undefined,
  rng: RandomSource,
  defaultClass: string = DEFAULT_SPECTRAL_CLASS
): SynthesizedStar {
  const requested = spectralClass?.trim() ?? '';
  let classification = requested === '' ? null : parseSpectralClass(requested);
  let used = requested;
  let defaulted = false;

  if (classification === null) {
    defaulted = true;
    used = defaultClass;
    classification = parseSpectralClass(defaultClass) ?? { letter: 'M', subclass: null };
  }

  const ranges = SPECTRAL_RANGES[classification.letter];
  const properties =
    classification.subclass === null
      ? drawProperties(ranges, rng)
      : interpolateProperties(ranges, classification.subclass);

  return {
    ...properties,
    spectralClass: used,
    letter: classification.letter,
    defaulted,
  };
}
