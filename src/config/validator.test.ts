import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigValidationError,
  validateConfig,
  assertConfigValid,
} from './validator.js';
import {
  DEFAULT_CONFIG,
  mergeConfig,
  parseConfig,
  type Config,
  type PartialConfig,
} from './index.js';

function withOverrides(partial: PartialConfig): Config {
  return mergeConfig(DEFAULT_CONFIG, partial);
}

function fieldsOf(partial: PartialConfig): string[] {
  return validateConfig(withOverrides(partial)).errors.map((e) => e.field);
}

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept the default configuration', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    describe('path validation', () => {
      it('should reject empty path settings', () => {
        expect(fieldsOf({ paths: { input: '', catalog_file: '   ' } })).toEqual([
          'paths.input',
          'paths.catalog_file',
        ]);
      });
    });

    describe('distance validation', () => {
      it('should require a positive maximum distance', () => {
        const result = validateConfig(withOverrides({ distance: { max_distance_ly: 0 } }));
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
          {
            field: 'distance.max_distance_ly',
            value: 0,
            message: "'distance.max_distance_ly' must be a positive number, got 0",
          },
        ]);
      });

      it('should require a positive parsec threshold', () => {
        expect(fieldsOf({ distance: { parsec_threshold: -1 } })).toContain(
          'distance.parsec_threshold'
        );
      });

      it('should reject a negative epsilon', () => {
        expect(fieldsOf({ distance: { small_value_epsilon: -0.5 } })).toEqual([
          'distance.small_value_epsilon',
        ]);
      });

      it('should require epsilon below the parsec threshold', () => {
        const result = validateConfig(
          withOverrides({ distance: { small_value_epsilon: 30, parsec_threshold: 25 } })
        );
        expect(result.errors[0]?.message).toBe(
          "'distance.small_value_epsilon' must be below 'distance.parsec_threshold' (25)"
        );
      });
    });

    describe('catalog validation', () => {
      it('should require non-negative integer counts', () => {
        expect(fieldsOf({ catalog: { target_size: 10.5, header_rows: -1 } })).toEqual([
          'catalog.target_size',
          'catalog.header_rows',
        ]);
      });

      it('should accept seeds across the 32-bit range', () => {
        expect(fieldsOf({ catalog: { seed: 0 } })).toEqual([]);
        expect(fieldsOf({ catalog: { seed: 0xffffffff } })).toEqual([]);
      });

      it('should reject seeds outside the 32-bit range', () => {
        expect(fieldsOf({ catalog: { seed: -1 } })).toEqual(['catalog.seed']);
        expect(fieldsOf({ catalog: { seed: 2 ** 32 } })).toEqual(['catalog.seed']);
        expect(fieldsOf({ catalog: { seed: 1.5 } })).toEqual(['catalog.seed']);
      });

      it('should reject an unrecognized default classification', () => {
        const result = validateConfig(
          withOverrides({ catalog: { default_spectral_class: '??' } })
        );
        expect(result.errors[0]?.message).toBe(
          "'catalog.default_spectral_class' is not a recognized classification: '??'"
        );
      });
    });

    it('should leave the existence of paths to catalog IO', () => {
      const config = parseConfig('[paths]\ninput = "/nowhere/at/all.csv"\n');
      expect(validateConfig(config).valid).toBe(true);
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid configuration', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should summarize every error in the message', () => {
      const config = withOverrides({ distance: { max_distance_ly: 0 }, catalog: { seed: -1 } });
      try {
        assertConfigValid(config);
        expect.fail('expected assertConfigValid to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(2);
          expect(error.message).toBe(
            'Configuration validation failed with 2 error(s):\n' +
              "  - distance.max_distance_ly: 'distance.max_distance_ly' must be a positive number, got 0\n" +
              "  - catalog.seed: 'catalog.seed' must be an integer between 0 and 4294967295, got -1"
          );
        }
      }
    });
  });

  describe('property-based tests', () => {
    it('should accept any positive distance settings with epsilon below threshold', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 0.1, max: 1000, noNaN: true }),
          fc.double({ min: 1, max: 100, noNaN: true }),
          fc.double({ min: 0, max: 0.99, noNaN: true }),
          (maxDistance, threshold, epsilonFraction) => {
            const config = withOverrides({
              distance: {
                max_distance_ly: maxDistance,
                parsec_threshold: threshold,
                small_value_epsilon: threshold * epsilonFraction,
              },
            });
            return validateConfig(config).valid;
          }
        ),
        { numRuns: 200 }
      );
    });

    it('should reject any negative target size', () => {
      fc.assert(
        fc.property(fc.integer({ min: -1_000_000, max: -1 }), (size) => {
          return !validateConfig(withOverrides({ catalog: { target_size: size } })).valid;
        }),
        { numRuns: 100 }
      );
    });
  });
});
