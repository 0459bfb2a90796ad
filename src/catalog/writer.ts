/**
 * CSV serialization of the catalog, the companion mapping and the
 * visualization schema.
 *
 * @packageDocumentation
 */

import { stringify } from 'csv-stringify/sync';
import { fromCartesian } from '../resolve/index.js';
import type { CompanionMapping, StarRecord } from './types.js';

/**
 * Column order of the catalog file.
 */
export const CATALOG_COLUMNS = [
  'name',
  'x',
  'y',
  'z',
  'stellar_class',
  'mass',
  'temperature',
  'luminosity',
  'absolute_magnitude',
] as const;

/**
 * Column order of the companion mapping file.
 */
export const COMPANION_COLUMNS = ['companion_name', 'primary_star_name'] as const;

/**
 * Column order expected by the 3D viewer.
 */
export const VISUALIZATION_COLUMNS = ['Name', 'Distance', 'RA', 'Dec', 'SpectralType'] as const;

/**
 * Decimal places per numeric catalog column.
 */
export const CATALOG_PRECISION = {
  position: 6,
  mass: 3,
  luminosity: 6,
  absoluteMagnitude: 2,
  angle: 6,
} as const;

/**
 * A row of the visualization schema. RA and Dec are in degrees.
 */
export interface VisualizationRow {
  readonly Name: string;
  readonly Distance: number;
  readonly RA: number;
  readonly Dec: number;
  readonly SpectralType: string;
}

/**
 * Rounds half away from zero to a fixed number of decimals. Never returns `-0`.
 *
 * @example
 * ```typescript
 * roundTo(2.345678, 2); // 2.35
 * roundTo(-0.0000001, 6); // 0
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const scale = 10 ** decimals;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * scale)) / scale;
  return rounded === 0 ? 0 : rounded;
}

function fixed(value: number, decimals: number): string {
  return String(roundTo(value, decimals));
}

/**
 * Serializes stars to the catalog CSV format, header included.
 *
 * @param stars - Stars in output order.
 * @returns CSV text with a trailing newline.
 */
export function formatCatalogCsv(stars: readonly StarRecord[]): string {
  const rows = stars.map((star) => [
    star.name,
    fixed(star.position.x, CATALOG_PRECISION.position),
    fixed(star.position.y, CATALOG_PRECISION.position),
    fixed(star.position.z, CATALOG_PRECISION.position),
    star.spectralClass,
    fixed(star.mass, CATALOG_PRECISION.mass),
    String(Math.trunc(star.temperature)),
    fixed(star.luminosity, CATALOG_PRECISION.luminosity),
    fixed(star.absoluteMagnitude, CATALOG_PRECISION.absoluteMagnitude),
  ]);

  return stringify([[...CATALOG_COLUMNS], ...rows]);
}

/**
 * Serializes the companion mapping, sorted by companion name.
 *
 * @param mapping - Companion name to primary name.
 * @returns CSV text with a trailing newline.
 */
export function formatCompanionCsv(mapping: CompanionMapping): string {
  const rows = [...mapping].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return stringify([[...COMPANION_COLUMNS], ...rows]);
}

/**
 * Converts stars to the viewer's `Name, Distance, RA, Dec, SpectralType` schema.
 *
 * @param stars - Stars in output order.
 * @returns One row per star, angles in degrees.
 */
export function toVisualizationRows(stars: readonly StarRecord[]): VisualizationRow[] {
  return stars.map((star) => {
    const spherical = fromCartesian(star.position);
    return {
      Name: star.name,
      Distance: spherical.distance,
      RA: spherical.raDegrees,
      Dec: spherical.decDegrees,
      SpectralType: star.spectralClass,
    };
  });
}

/**
 * Serializes stars in the viewer's schema.
 *
 * @param stars - Stars in output order.
 * @returns CSV text with a trailing newline.
 */
export function formatVisualizationCsv(stars: readonly StarRecord[]): string {
  const rows = toVisualizationRows(stars).map((row) => [
    row.Name,
    fixed(row.Distance, CATALOG_PRECISION.position),
    fixed(row.RA, CATALOG_PRECISION.angle),
    fixed(row.Dec, CATALOG_PRECISION.angle),
    row.SpectralType,
  ]);

  return stringify([[...VISUALIZATION_COLUMNS], ...rows]);
}
