/**
 * Spectral classification parsing and per-class property ranges.
 *
 * @packageDocumentation
 */

/**
 * Spectral type letters with a property range entry. `D` covers white
 * dwarfs and other compact remnants.
 */
export type SpectralLetter = 'O' | 'B' | 'A' | 'F' | 'G' | 'K' | 'M' | 'L' | 'T' | 'Y' | 'D';

/**
 * Inclusive `[low, high]` interval.
 */
export type Range = readonly [low: number, high: number];

/**
 * Property ranges for one spectral type.
 */
export interface SpectralRanges {
  /** Solar masses. */
  readonly mass: Range;
  /** Kelvin. */
  readonly temperature: Range;
  /** Solar luminosities. */
  readonly luminosity: Range;
  /** Absolute magnitude; the low end is the bright end. */
  readonly absoluteMagnitude: Range;
}

/**
 * Order-of-magnitude property ranges per spectral type.
 */
export const SPECTRAL_RANGES: Readonly<Record<SpectralLetter, SpectralRanges>> = {
  O: { mass: [15, 90], temperature: [30000, 50000], luminosity: [30000, 1000000], absoluteMagnitude: [-6.5, -4.0] },
  B: { mass: [2.1, 16], temperature: [10000, 30000], luminosity: [25, 30000], absoluteMagnitude: [-4.0, 1.0] },
  A: { mass: [1.4, 2.1], temperature: [7500, 10000], luminosity: [5, 25], absoluteMagnitude: [1.0, 2.5] },
  F: { mass: [1.04, 1.4], temperature: [6000, 7500], luminosity: [1.5, 5], absoluteMagnitude: [2.5, 4.5] },
  G: { mass: [0.8, 1.04], temperature: [5200, 6000], luminosity: [0.6, 1.5], absoluteMagnitude: [4.5, 6.0] },
  K: { mass: [0.45, 0.8], temperature: [3700, 5200], luminosity: [0.08, 0.6], absoluteMagnitude: [6.0, 9.0] },
  M: { mass: [0.08, 0.45], temperature: [2400, 3700], luminosity: [0.0001, 0.08], absoluteMagnitude: [9.0, 17.0] },
  L: { mass: [0.06, 0.08], temperature: [1300, 2400], luminosity: [0.00001, 0.0001], absoluteMagnitude: [17.0, 20.0] },
  T: { mass: [0.02, 0.06], temperature: [600, 1300], luminosity: [0.000001, 0.00001], absoluteMagnitude: [20.0, 25.0] },
  Y: { mass: [0.01, 0.02], temperature: [300, 600], luminosity: [0.0000001, 0.000001], absoluteMagnitude: [25.0, 30.0] },
  D: { mass: [0.5, 1.4], temperature: [8000, 40000], luminosity: [0.0001, 0.01], absoluteMagnitude: [11.0, 16.0] },
};

/**
 * Classification used when a star has none: a mid-M main-sequence dwarf.
 */
export const DEFAULT_SPECTRAL_CLASS = 'M5V';

/**
 * Letters searched for in ordinary (non-remnant) classifications, in the
 * order they are listed in the table.
 */
const MAIN_SEQUENCE_LETTERS: ReadonlySet<string> = new Set([
  'O',
  'B',
  'A',
  'F',
  'G',
  'K',
  'M',
  'L',
  'T',
  'Y',
]);

const SUBCLASS_PATTERN = /\d+(?:\.\d+)?/;

/**
 * Parsed spectral classification.
 */
export interface SpectralClassification {
  readonly letter: SpectralLetter;
  /** Numeric subclass in `[0, 9]`, or `null` when absent or out of range. */
  readonly subclass: number | null;
}

/**
 * Narrows a character to a main-sequence {@link SpectralLetter}.
 */
function isMainSequenceLetter(char: string): char is Exclude<SpectralLetter, 'D'> {
  return MAIN_SEQUENCE_LETTERS.has(char);
}

/**
 * Parses a spectral classification string.
 *
 * Strings starting with `D` or `W` are compact remnants. Otherwise the first
 * recognised type letter wins, so subdwarf prefixes such as `sd` are skipped.
 *
 * @param raw - Classification as it appears in the catalog.
 * @returns The parsed letter and subclass, or `null` when no letter is recognised.
 *
 * @example
 * ```typescript
 * parseSpectralClass('K1V');    // { letter: 'K', subclass: 1 }
 * parseSpectralClass('M5.5Ve'); // { letter: 'M', subclass: 5.5 }
 * parseSpectralClass('DA2');    // { letter: 'D', subclass: 2 }
 * parseSpectralClass('sdM4');   // { letter: 'M', subclass: 4 }
 * parseSpectralClass('?');      // null
 * ```
 */
export function parseSpectralClass(raw: string): SpectralClassification | null {
  const upper = raw.trim().toUpperCase();
  if (upper === '') {
    return null;
  }

  let letter: SpectralLetter | null = null;
  if (upper.startsWith('D') || upper.startsWith('W')) {
    letter = 'D';
  } else {
    for (const char of upper) {
      if (isMainSequenceLetter(char)) {
        letter = char;
        break;
      }
    }
  }

  if (letter === null) {
    return null;
  }

  const match = SUBCLASS_PATTERN.exec(upper);
  const parsed = match === null ? Number.NaN : Number.parseFloat(match[0]);
  const subclass = Number.isFinite(parsed) && parsed <= 9 ? parsed : null;

  return { letter, subclass };
}
