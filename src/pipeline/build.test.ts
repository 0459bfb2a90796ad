import { describe, expect, it, vi } from 'vitest';
import type { CatalogRow } from '../catalog/index.js';
import { getDefaultConfig, mergeConfig } from '../config/index.js';
import { decodeCatalogBuffer } from '../ingest/index.js';
import { distanceFromOrigin, fromCartesian } from '../resolve/index.js';
import type { LogSink } from '../utils/logger.js';
import { createSeededRandom } from '../utils/random.js';
import { SECTION_MARKER, buildCatalog, createPipelineContext, processRow } from './index.js';

const DEG = '°';
const MIN = '′';
const TOWARDS_RA_0 = `00h 00m +00${DEG} 00${MIN}`;
const TOWARDS_RA_6 = `06h 00m +00${DEG} 00${MIN}`;

const SOURCE = [
  'Stars within 80 light-years',
  'System,Star,Distance,Coordinates,Class',
  'Sol System,Sun,,,G2V',
  `Alpha Centauri,Rigil Kentaurus,1.34,${TOWARDS_RA_0},G2V`,
  `,B,,${TOWARDS_RA_6},K1V`,
  ',Proxima Centauri,1.30,,M5.5Ve',
  'Wolf 359,Wolf 359,2.41,,',
  ',10 parsecs and beyond,,,',
  `Far Away,Far Away,30 pc,${TOWARDS_RA_0},K0V`,
  'Nowhere,Nowhere Star,unknown,,K0V',
  'lonely',
  ',,,,',
  '',
].join('\n');

function recordingSink(): LogSink {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function row(fields: Partial<Omit<CatalogRow, 'line'>>): CatalogRow {
  return {
    line: 1,
    system: '',
    name: '',
    distance: '',
    coordinates: '',
    spectralClass: '',
    ...fields,
  };
}

describe('buildCatalog', () => {
  const result = buildCatalog(SOURCE, { rng: createSeededRandom(7) });

  it('should order real stars by distance after Sol', () => {
    expect(result.stars.map((star) => star.name)).toEqual([
      'Sol',
      'Proxima Centauri',
      'Alpha Centauri A',
      'Alpha Centauri B',
      'Wolf 359',
    ]);
  });

  it('should convert small unmarked values from parsecs', () => {
    const byName = new Map(result.stars.map((star) => [star.name, star]));
    expect(byName.get('Alpha Centauri A')?.position.x).toBeCloseTo(4.3704904, 6);
    expect(byName.get('Alpha Centauri A')?.position.y).toBe(0);
    const proxima = byName.get('Proxima Centauri');
    expect(proxima === undefined ? NaN : distanceFromOrigin(proxima.position)).toBeCloseTo(
      4.240028,
      6
    );
  });

  it('should give lettered rows the header distance', () => {
    const companion = result.stars.find((star) => star.name === 'Alpha Centauri B');
    expect(companion?.position.y).toBeCloseTo(4.3704904, 6);
    expect(companion?.position.x).toBeCloseTo(0, 10);
    expect(companion?.spectralClass).toBe('K1V');
  });

  it('should default a missing class', () => {
    const wolf = result.stars.find((star) => star.name === 'Wolf 359');
    expect(wolf?.spectralClass).toBe('M5V');
    expect(wolf?.mass).toBeCloseTo(0.244444, 6);
  });

  it('should map companions to their primaries', () => {
    expect(result.companions).toEqual(
      new Map([
        ['Alpha Centauri B', 'Alpha Centauri A'],
        ['Proxima Centauri', 'Alpha Centauri A'],
      ])
    );
  });

  it('should count every outcome', () => {
    expect(result.stats).toEqual({
      rowsRead: 10,
      starsAccepted: 4,
      skipped: {
        too_few_fields: 1,
        missing_name: 1,
        section_marker: 1,
        missing_distance: 2,
        beyond_max_distance: 1,
      },
      randomPositions: 2,
      defaultedClasses: 1,
      fillerStars: 0,
    });
  });

  it('should be reproducible for the same seed', () => {
    const again = buildCatalog(SOURCE, { rng: createSeededRandom(7) });
    expect(again.stars).toEqual(result.stars);
  });

  it('should seed from the configuration', () => {
    const config = mergeConfig(getDefaultConfig(), { catalog: { seed: 3, target_size: 8 } });
    const first = buildCatalog(SOURCE, { config });
    const second = buildCatalog(SOURCE, { config });
    expect(first.stars).toHaveLength(8);
    expect(first.stats.fillerStars).toBe(3);
    expect(first.stars).toEqual(second.stars);
  });

  it('should log a summary at info', () => {
    const logger = recordingSink();
    buildCatalog(SOURCE, { rng: createSeededRandom(1), logger });
    expect(logger.info).toHaveBeenCalledWith(
      'catalog_built',
      expect.objectContaining({ stars: 5, companions: 2, rowsRead: 10 })
    );
  });

  it('should place stars with a 0xD0 minus sign in the southern hemisphere', () => {
    const bytes = Buffer.from(
      [
        'Stars within 80 light-years',
        'System,Star,Distance,Coordinates,Class',
        "Alpha Centauri,Rigil Kentaurus,1.34,14h 39m 36.5s \xd060\xa1 50' 02,G2V",
      ].join('\r\n'),
      'latin1'
    );
    const southern = buildCatalog(decodeCatalogBuffer(bytes), { rng: createSeededRandom(3) });
    const alpha = southern.stars.find((star) => star.name === 'Alpha Centauri A');

    expect(southern.stats.randomPositions).toBe(0);
    expect(alpha?.position.z).toBeLessThan(0);
    expect(alpha === undefined ? NaN : fromCartesian(alpha.position).decDegrees).toBeCloseTo(
      -60.833889,
      6
    );
  });
});

describe('processRow', () => {
  it('should let a header row without a star supply fallbacks', () => {
    const context = createPipelineContext(getDefaultConfig(), { rng: createSeededRandom(1) });

    const header = processRow(
      context,
      row({ system: 'Luhman 16', distance: '0.6', spectralClass: 'L7.5' })
    );
    expect(header).toEqual({ kind: 'skipped', reason: 'missing_name' });

    const member = processRow(context, row({ name: 'A' }));
    expect(member.kind).toBe('accepted');
    if (member.kind === 'accepted') {
      expect(member.record.name).toBe('Luhman 16 A');
      expect(member.record.spectralClass).toBe('L7.5');
      expect(distanceFromOrigin(member.record.position)).toBeCloseTo(1.956936, 6);
    }
    expect(context.stats.defaultedClasses).toBe(0);
  });

  it('should skip section markers', () => {
    const logger = recordingSink();
    const context = createPipelineContext(getDefaultConfig(), { logger });
    const outcome = processRow(context, row({ name: `Beyond ${SECTION_MARKER}`, distance: '3' }));
    expect(outcome).toEqual({ kind: 'skipped', reason: 'section_marker' });
    expect(logger.debug).toHaveBeenCalledWith('row_skipped', {
      line: 1,
      reason: 'section_marker',
    });
  });

  it('should use the configured maximum distance', () => {
    const config = mergeConfig(getDefaultConfig(), { distance: { max_distance_ly: 5 } });
    const context = createPipelineContext(config, { rng: createSeededRandom(1) });
    expect(processRow(context, row({ name: 'Near', distance: '1' })).kind).toBe('accepted');
    expect(processRow(context, row({ name: 'Far', distance: '2' }))).toEqual({
      kind: 'skipped',
      reason: 'beyond_max_distance',
    });
  });

  it('should use the configured default class', () => {
    const config = mergeConfig(getDefaultConfig(), {
      catalog: { default_spectral_class: 'K0V' },
    });
    const context = createPipelineContext(config, { rng: createSeededRandom(1) });
    const outcome = processRow(context, row({ name: 'Plain', distance: '1' }));
    expect(outcome.kind === 'accepted' ? outcome.record.spectralClass : null).toBe('K0V');
  });
});
