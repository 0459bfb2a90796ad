import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[paths]
input = "data/nearby.csv"
output_dir = "out"
catalog_file = "catalog.csv"
companions_file = "pairs.csv"
visualization_file = "viewer.csv"

[distance]
max_distance_ly = 50.5
parsec_threshold = 40
small_value_epsilon = 0.01
require_explicit_marker = false

[catalog]
target_size = 1400
seed = 7
header_rows = 1
emit_visualization = true
default_spectral_class = "K5V"

[logging]
debug = true
`;
        expect(parseConfig(toml)).toEqual({
          paths: {
            input: 'data/nearby.csv',
            output_dir: 'out',
            catalog_file: 'catalog.csv',
            companions_file: 'pairs.csv',
            visualization_file: 'viewer.csv',
          },
          distance: {
            max_distance_ly: 50.5,
            parsec_threshold: 40,
            small_value_epsilon: 0.01,
            require_explicit_marker: false,
          },
          catalog: {
            target_size: 1400,
            seed: 7,
            header_rows: 1,
            emit_visualization: true,
            default_spectral_class: 'K5V',
          },
          logging: { debug: true },
        });
      });

      it('should fill missing fields of a partial section with defaults', () => {
        const config = parseConfig('[distance]\nparsec_threshold = 50\n');
        expect(config.distance).toEqual({ ...DEFAULT_CONFIG.distance, parsec_threshold: 50 });
        expect(config.paths).toEqual(DEFAULT_CONFIG.paths);
        expect(config.catalog.seed).toBeUndefined();
      });

      it('should ignore unknown sections and keys', () => {
        const config = parseConfig('[extras]\nfoo = 1\n[catalog]\nunknown = "x"\n');
        expect(config).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('error handling', () => {
      it('should reject invalid TOML syntax', () => {
        expect(() => parseConfig('[paths\ninput = "x"')).toThrow(ConfigParseError);
        expect(() => parseConfig('[paths\ninput = "x"')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should keep the TOML error as the cause', () => {
        try {
          parseConfig('= oops');
          expect.fail('expected parseConfig to throw');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });

      it('should reject a string where a number is expected', () => {
        expect(() => parseConfig('[catalog]\ntarget_size = "many"\n')).toThrow(
          "Invalid type for 'catalog.target_size': expected number, got string"
        );
      });

      it('should reject a number where a string is expected', () => {
        expect(() => parseConfig('[paths]\ninput = 3\n')).toThrow(
          "Invalid type for 'paths.input': expected string, got number"
        );
      });

      it('should reject a string where a boolean is expected', () => {
        expect(() => parseConfig('[logging]\ndebug = "yes"\n')).toThrow(
          "Invalid type for 'logging.debug': expected boolean, got string"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('distance = 5\n')).toThrow(
          "Invalid type for 'distance': expected table, got number"
        );
      });
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy that does not alias the defaults', () => {
      const config = getDefaultConfig();
      config.distance.parsec_threshold = 99;
      config.paths.input = 'elsewhere.csv';
      expect(DEFAULT_CONFIG.distance.parsec_threshold).toBe(25);
      expect(DEFAULT_CONFIG.paths.input).toBe('stellar_data/star-ref.csv');
    });
  });

  describe('property-based tests', () => {
    it('should read back any positive threshold', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1_000_000 }), (threshold) => {
          const config = parseConfig(`[distance]\nparsec_threshold = ${String(threshold)}\n`);
          return config.distance.parsec_threshold === threshold;
        }),
        { numRuns: 100 }
      );
    });

    it('should read back any plain file name', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^[a-z][a-z0-9_-]{0,20}\.csv$/), (name) => {
          const config = parseConfig(`[paths]\ncatalog_file = "${name}"\n`);
          return config.paths.catalog_file === name;
        }),
        { numRuns: 100 }
      );
    });
  });
});
