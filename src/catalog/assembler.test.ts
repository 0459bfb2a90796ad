import { describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import { distanceFromOrigin } from '../resolve/index.js';
import { createSeededRandom } from '../utils/random.js';
import type { LogSink } from '../utils/logger.js';
import {
  SOL_REFERENCE,
  assembleCatalog,
  filterCompanionMapping,
  generateFillerStar,
  type StarRecord,
} from './index.js';

function star(name: string, x: number, overrides: Partial<StarRecord> = {}): StarRecord {
  return {
    name,
    position: { x, y: 0, z: 0 },
    spectralClass: 'M5V',
    mass: 0.2,
    temperature: 3000,
    luminosity: 0.001,
    absoluteMagnitude: 13,
    procedural: false,
    ...overrides,
  };
}

function neverCalled(): number {
  throw new Error('random source should not be consulted');
}

function recordingSink(): LogSink {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const NO_COMPANIONS = new Map<string, string>();

describe('Catalog Assembler', () => {
  describe('Sol anchor', () => {
    it('should insert Sol at the front when absent', () => {
      const catalog = assembleCatalog([star('Wolf 359', 7.9)], NO_COMPANIONS, {
        maxDistance: 100,
        rng: neverCalled,
      });
      expect(catalog.stars.map((s) => s.name)).toEqual(['Sol', 'Wolf 359']);
      expect(catalog.stars[0]).toEqual(SOL_REFERENCE);
    });

    it('should replace an existing Sol record with the reference', () => {
      const catalog = assembleCatalog(
        [star('Wolf 359', 7.9), star('Sol', 0.5, { spectralClass: 'G' })],
        NO_COMPANIONS,
        { maxDistance: 100, rng: neverCalled }
      );
      expect(catalog.stars).toHaveLength(2);
      expect(catalog.stars[0]).toEqual(SOL_REFERENCE);
    });
  });

  describe('deduplication', () => {
    it('should keep the first record for a repeated name and warn', () => {
      const logger = recordingSink();
      const catalog = assembleCatalog(
        [star('Ross 128', 11), star('Ross 128', 3)],
        NO_COMPANIONS,
        { maxDistance: 100, rng: neverCalled, logger }
      );

      const ross = catalog.stars.filter((s) => s.name === 'Ross 128');
      expect(ross).toHaveLength(1);
      expect(ross[0]?.position.x).toBe(11);
      expect(logger.warn).toHaveBeenCalledWith('duplicate_star_dropped', { name: 'Ross 128' });
    });
  });

  describe('ordering', () => {
    it('should sort by distance and keep insertion order on ties', () => {
      const catalog = assembleCatalog(
        [star('Far', 20), star('Tie one', 5), star('Near', 1), star('Tie two', -5)],
        NO_COMPANIONS,
        { maxDistance: 100, rng: neverCalled }
      );
      expect(catalog.stars.map((s) => s.name)).toEqual([
        'Sol',
        'Near',
        'Tie one',
        'Tie two',
        'Far',
      ]);
    });
  });

  describe('padding', () => {
    it('should append filler stars up to the target size', () => {
      const real = [1, 2, 3, 4].map((x) => star(`Real ${String(x)}`, x));
      const catalog = assembleCatalog(real, NO_COMPANIONS, {
        maxDistance: 50,
        targetSize: 10,
        rng: createSeededRandom(99),
      });

      expect(catalog.stars).toHaveLength(10);
      const filler = catalog.stars.slice(5);
      expect(filler.map((s) => s.name)).toEqual([
        'Star-0001',
        'Star-0002',
        'Star-0003',
        'Star-0004',
        'Star-0005',
      ]);
      for (const s of filler) {
        expect(s.procedural).toBe(true);
        expect(distanceFromOrigin(s.position)).toBeLessThanOrEqual(50 + 1e-9);
      }
      expect(catalog.stars.slice(0, 5).every((s) => !s.procedural)).toBe(true);
    });

    it('should skip filler names already in use', () => {
      const catalog = assembleCatalog([star('Star-0001', 3)], NO_COMPANIONS, {
        maxDistance: 50,
        targetSize: 3,
        rng: createSeededRandom(5),
      });
      expect(catalog.stars.map((s) => s.name)).toEqual(['Sol', 'Star-0001', 'Star-0002']);
    });

    it('should not pad when the target is already reached', () => {
      const catalog = assembleCatalog([star('A', 1), star('B', 2)], NO_COMPANIONS, {
        maxDistance: 50,
        targetSize: 2,
        rng: neverCalled,
      });
      expect(catalog.stars).toHaveLength(3);
    });

    it('should produce the same filler for the same seed', () => {
      const build = (): readonly StarRecord[] =>
        assembleCatalog([], NO_COMPANIONS, {
          maxDistance: 30,
          targetSize: 6,
          rng: createSeededRandom(2024),
        }).stars;
      expect(build()).toEqual(build());
    });
  });

  describe('generateFillerStar', () => {
    it('should place and classify a star from its draws', () => {
      const draws = [0.125, 0, 0.5, 0, 0.55];
      const rng = (): number => {
        const next = draws.shift();
        if (next === undefined) {
          throw new Error('scripted random source exhausted');
        }
        return next;
      };

      const filler = generateFillerStar('Star-0042', 80, rng);
      expect(filler.name).toBe('Star-0042');
      expect(filler.position.x).toBeCloseTo(40, 10);
      expect(filler.position.y).toBeCloseTo(0, 10);
      expect(filler.position.z).toBeCloseTo(0, 10);
      expect(filler.spectralClass).toBe('M5V');
      expect(filler.mass).toBeCloseTo(0.244444, 6);
      expect(filler.temperature).toBe(2977);
      expect(filler.procedural).toBe(true);
      expect(draws).toHaveLength(0);
    });
  });

  describe('companion mapping', () => {
    it('should drop mappings that name absent stars', () => {
      const catalog = assembleCatalog(
        [star('Luhman 16 A', 6.5), star('Luhman 16 B', 6.5)],
        new Map([
          ['Luhman 16 B', 'Luhman 16 A'],
          ['Ghost B', 'Ghost A'],
          ['Luhman 16 C', 'Luhman 16 A'],
        ]),
        { maxDistance: 100, rng: neverCalled }
      );
      expect(catalog.companions).toEqual(new Map([['Luhman 16 B', 'Luhman 16 A']]));
    });

    it('should re-assert alias-forced memberships over grouped ones', () => {
      const catalog = assembleCatalog(
        [
          star('Alpha Centauri A', 4.37),
          star('Alpha Centauri B', 4.37),
          star('Proxima Centauri', 4.24),
        ],
        new Map([['Proxima Centauri', 'Alpha Centauri B']]),
        { maxDistance: 100, rng: neverCalled }
      );
      expect(catalog.companions).toEqual(
        new Map([
          ['Proxima Centauri', 'Alpha Centauri A'],
          ['Alpha Centauri B', 'Alpha Centauri A'],
        ])
      );
    });
  });

  describe('filterCompanionMapping', () => {
    it('should drop self-mappings', () => {
      const names = new Set(['X', 'Y']);
      expect(
        filterCompanionMapping(
          new Map([
            ['X', 'X'],
            ['Y', 'X'],
          ]),
          names
        )
      ).toEqual(new Map([['Y', 'X']]));
    });
  });

  describe('property-based tests', () => {
    const NAMES = [
      'Sol',
      'Wolf 359',
      'Ross 128',
      'Alpha Centauri A',
      'Alpha Centauri B',
      'Proxima Centauri',
      'Star-0001',
    ];
    const coordinate = fc.double({ min: -100, max: 100, noNaN: true });
    const recordArb = fc
      .record({ name: fc.constantFrom(...NAMES), x: coordinate, y: coordinate, z: coordinate })
      .map(({ name, x, y, z }) => star(name, x, { position: { x, y, z } }));
    const nameOrGhost = fc.constantFrom(...NAMES, 'Ghost');
    const mappingArb = fc
      .array(fc.tuple(nameOrGhost, nameOrGhost), { maxLength: 10 })
      .map((entries) => new Map(entries));

    it('should keep the catalog-wide invariants for any input', () => {
      fc.assert(
        fc.property(
          fc.array(recordArb, { maxLength: 20 }),
          mappingArb,
          fc.nat({ max: 15 }),
          fc.integer(),
          (records, companions, targetSize, seed) => {
            const catalog = assembleCatalog(records, companions, {
              maxDistance: 80,
              targetSize,
              rng: createSeededRandom(seed),
            });
            const names = catalog.stars.map((s) => s.name);
            const present = new Set(names);

            const sol = catalog.stars.filter((s) => s.name === 'Sol');
            expect(sol).toHaveLength(1);
            expect(sol[0]?.position).toEqual({ x: 0, y: 0, z: 0 });
            expect(present.size).toBe(names.length);

            for (const [companion, primary] of catalog.companions) {
              expect(companion).not.toBe(primary);
              expect(present.has(companion)).toBe(true);
              expect(present.has(primary)).toBe(true);
            }

            const real = catalog.stars.filter((s) => !s.procedural);
            expect(catalog.stars.slice(0, real.length)).toEqual(real);
            for (let i = 1; i < real.length; i++) {
              const previous = real[i - 1];
              const current = real[i];
              if (previous !== undefined && current !== undefined) {
                expect(distanceFromOrigin(current.position)).toBeGreaterThanOrEqual(
                  distanceFromOrigin(previous.position)
                );
              }
            }
            expect(catalog.stars.length).toBe(Math.max(targetSize, real.length));
          }
        ),
        { numRuns: 200 }
      );
    });
  });
});
