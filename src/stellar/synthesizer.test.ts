import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { createSeededRandom } from '../utils/random.js';
import {
  SPECTRAL_RANGES,
  drawProperties,
  interpolateProperties,
  synthesizeProperties,
  type SpectralLetter,
  type StellarProperties,
} from './index.js';

const LETTERS: readonly SpectralLetter[] = ['O', 'B', 'A', 'F', 'G', 'K', 'M', 'L', 'T', 'Y', 'D'];

function unusedRandom(): number {
  throw new Error('random source should not be consulted');
}

function withinRanges(letter: SpectralLetter, properties: StellarProperties): boolean {
  const ranges = SPECTRAL_RANGES[letter];
  const inside = (value: number, [low, high]: readonly [number, number]): boolean =>
    value >= low && value <= high;
  return (
    inside(properties.mass, ranges.mass) &&
    inside(properties.temperature, ranges.temperature) &&
    inside(properties.luminosity, ranges.luminosity) &&
    inside(properties.absoluteMagnitude, ranges.absoluteMagnitude)
  );
}

describe('Stellar Property Synthesizer', () => {
  describe('interpolateProperties', () => {
    it('should put subclass 0 at the hot, massive, bright end', () => {
      const props = interpolateProperties(SPECTRAL_RANGES.G, 0);
      expect(props.mass).toBeCloseTo(1.04, 10);
      expect(props.temperature).toBe(6000);
      expect(props.luminosity).toBeCloseTo(1.5, 10);
      expect(props.absoluteMagnitude).toBeCloseTo(4.5, 10);
    });

    it('should put subclass 9 at the cool, light, faint end', () => {
      const props = interpolateProperties(SPECTRAL_RANGES.G, 9);
      expect(props.mass).toBeCloseTo(0.8, 10);
      expect(props.temperature).toBe(5200);
      expect(props.luminosity).toBeCloseTo(0.6, 10);
      expect(props.absoluteMagnitude).toBeCloseTo(6.0, 10);
    });

    it('should interpolate intermediate subclasses', () => {
      const props = interpolateProperties(SPECTRAL_RANGES.G, 2);
      expect(props.mass).toBeCloseTo(0.986667, 6);
      expect(props.temperature).toBe(5822);
      expect(props.absoluteMagnitude).toBeCloseTo(4.833333, 6);
    });

    it('should interpolate luminosity geometrically', () => {
      const props = interpolateProperties(SPECTRAL_RANGES.M, 4.5);
      expect(props.luminosity).toBeCloseTo(Math.sqrt(0.0001 * 0.08), 12);
    });
  });

  describe('drawProperties', () => {
    it('should draw each property from its range', () => {
      const props = drawProperties(SPECTRAL_RANGES.G, () => 0.5);
      expect(props.mass).toBeCloseTo(0.92, 10);
      expect(props.temperature).toBe(5600);
      expect(props.luminosity).toBeCloseTo(1.05, 10);
      expect(props.absoluteMagnitude).toBeCloseTo(5.25, 10);
    });
  });

  describe('synthesizeProperties', () => {
    it('should interpolate without randomness when a subclass is present', () => {
      const star = synthesizeProperties('G0V', unusedRandom);
      expect(star.mass).toBeCloseTo(1.04, 10);
      expect(star.temperature).toBe(6000);
      expect(star.spectralClass).toBe('G0V');
      expect(star.letter).toBe('G');
      expect(star.defaulted).toBe(false);
    });

    it('should draw randomly when the subclass is missing', () => {
      const star = synthesizeProperties('G', () => 0.5);
      expect(star.mass).toBeCloseTo(0.92, 10);
      expect(star.spectralClass).toBe('G');
      expect(star.defaulted).toBe(false);
    });

    it('should fall back to M5V for empty or unknown classes', () => {
      for (const input of ['', '?', undefined]) {
        const star = synthesizeProperties(input, unusedRandom);
        expect(star.spectralClass).toBe('M5V');
        expect(star.letter).toBe('M');
        expect(star.defaulted).toBe(true);
        expect(star.mass).toBeCloseTo(0.244444, 6);
        expect(star.temperature).toBe(2977);
        expect(star.absoluteMagnitude).toBeCloseTo(13.444444, 6);
      }
    });

    it('should use a caller-supplied default class', () => {
      const star = synthesizeProperties('', unusedRandom, 'K0V');
      expect(star.spectralClass).toBe('K0V');
      expect(star.mass).toBeCloseTo(0.8, 10);
      expect(star.defaulted).toBe(true);
    });

    it('should treat white dwarfs as remnants', () => {
      const star = synthesizeProperties('DA2', unusedRandom);
      expect(star.letter).toBe('D');
      expect(star.temperature).toBe(32888);
    });
  });

  describe('property-based tests', () => {
    it('should keep interpolated properties inside the class bounds', () => {
      fc.assert(
        fc.property(
          fc.constantFrom(...LETTERS),
          fc.double({ min: 0, max: 9, noNaN: true }),
          (letter, subclass) =>
            withinRanges(letter, interpolateProperties(SPECTRAL_RANGES[letter], subclass))
        ),
        { numRuns: 300 }
      );
    });

    it('should keep drawn properties inside the class bounds', () => {
      fc.assert(
        fc.property(fc.constantFrom(...LETTERS), fc.integer(), (letter, seed) =>
          withinRanges(letter, drawProperties(SPECTRAL_RANGES[letter], createSeededRandom(seed)))
        ),
        { numRuns: 300 }
      );
    });

    it('should be deterministic for classes with a subclass digit', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('O', 'B', 'A', 'F', 'G', 'K', 'M', 'L', 'T', 'Y'),
          fc.integer({ min: 0, max: 9 }),
          (letter, subclass) => {
            const spectralClass = `${letter}${String(subclass)}V`;
            const a = synthesizeProperties(spectralClass, unusedRandom);
            const b = synthesizeProperties(spectralClass, unusedRandom);
            return a.mass === b.mass && a.temperature === b.temperature;
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
