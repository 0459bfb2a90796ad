/**
 * Core catalog data types.
 *
 * @packageDocumentation
 */

import type { Vector3 } from '../resolve/index.js';

/**
 * One catalog line after field splitting, before any cleaning.
 */
export interface CatalogRow {
  /** 1-based line number in the decoded source. */
  readonly line: number;
  /** System header name; empty for rows inside an open system. */
  readonly system: string;
  readonly name: string;
  readonly distance: string;
  readonly coordinates: string;
  readonly spectralClass: string;
}

/**
 * A star in the output catalog.
 */
export interface StarRecord {
  /** Unique within a catalog. */
  readonly name: string;
  /** Heliocentric position in light-years. */
  readonly position: Vector3;
  readonly spectralClass: string;
  /** Solar masses. */
  readonly mass: number;
  /** Kelvin (integer). */
  readonly temperature: number;
  /** Solar luminosities. */
  readonly luminosity: number;
  readonly absoluteMagnitude: number;
  /** True for filler stars generated to reach a target size. */
  readonly procedural: boolean;
}

/**
 * Companion star name to primary star name.
 */
export type CompanionMapping = ReadonlyMap<string, string>;

/**
 * The assembled output of a run.
 */
export interface Catalog {
  /** Real stars sorted by distance from Sol, followed by any filler stars. */
  readonly stars: readonly StarRecord[];
  readonly companions: CompanionMapping;
}
