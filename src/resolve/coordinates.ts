/**
 * Celestial coordinate parsing and conversion to heliocentric Cartesian space.
 *
 * Axes follow the equatorial frame: +x towards RA 0h, +y towards RA 6h,
 * +z towards the north celestial pole. Units are light-years.
 *
 * @packageDocumentation
 */

import { normalizeText } from '../normalize/index.js';
import type { RandomSource } from '../utils/random.js';

/**
 * A point in heliocentric space, in light-years.
 */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Equatorial coordinates of a catalog entry.
 */
export interface EquatorialCoordinates {
  /** Right ascension in hours, `[0, 24)`. */
  readonly raHours: number;
  /** Declination in degrees, `[-90, 90]`. */
  readonly decDegrees: number;
}

/**
 * Spherical description of a Cartesian point, angles in degrees.
 */
export interface SphericalPosition {
  readonly distance: number;
  /** Right ascension in degrees, `[0, 360)`. */
  readonly raDegrees: number;
  readonly decDegrees: number;
}

const RA_PATTERN = /(\d{1,2})\s*h\s*(\d{1,2})\s*m\s*(?:(\d+(?:\.\d+)?)\s*s)?/i;
const DEC_PATTERN = /([+-]?)\s*(\d{1,2})\s*°\s*(\d{1,2})\s*[′'’]\s*(?:(\d+(?:\.\d+)?)\s*[″"]?)?/;
const DEG_TO_RAD = Math.PI / 180;

/**
 * Parses sexagesimal right ascension and declination.
 *
 * Accepts `HHh MMm SS.Ss` and `±DD° MM′ SS″`; seconds are optional.
 *
 * @param raw - Coordinate field as read from the catalog.
 * @returns Decimal hours and degrees, or `null` when either part is missing or out of range.
 *
 * @example
 * ```typescript
 * parseCoordinates('14h 29m 43.0s -62° 40′ 46″');
 * // { raHours: 14.495277..., decDegrees: -62.679444... }
 * ```
 */
export function parseCoordinates(raw: string | undefined): EquatorialCoordinates | null {
  const text = normalizeText(raw);
  if (text === '' || text.toLowerCase() === 'n/a') {
    return null;
  }

  const ra = RA_PATTERN.exec(text);
  if (ra === null) {
    return null;
  }
  // Search for the declination after the RA so the RA digits are not reused.
  const dec = DEC_PATTERN.exec(text.slice(ra.index + ra[0].length));
  if (dec === null) {
    return null;
  }

  const raHours = Number(ra[1]) + Number(ra[2]) / 60 + Number(ra[3] ?? '0') / 3600;
  const decMagnitude = Number(dec[2]) + Number(dec[3]) / 60 + Number(dec[4] ?? '0') / 3600;
  const decDegrees = dec[1] === '-' ? -decMagnitude : decMagnitude;

  if (!(raHours >= 0 && raHours < 24) || !(Math.abs(decDegrees) <= 90)) {
    return null;
  }

  return { raHours, decDegrees };
}

/**
 * Converts equatorial coordinates and a distance to Cartesian coordinates.
 *
 * @param raHours - Right ascension in hours.
 * @param decDegrees - Declination in degrees.
 * @param distance - Distance in light-years.
 * @returns The Cartesian position.
 */
export function toCartesian(raHours: number, decDegrees: number, distance: number): Vector3 {
  const ra = raHours * 15 * DEG_TO_RAD;
  const dec = decDegrees * DEG_TO_RAD;
  const planar = distance * Math.cos(dec);

  return {
    x: planar * Math.cos(ra),
    y: planar * Math.sin(ra),
    z: distance * Math.sin(dec),
  };
}

/**
 * Inverse of {@link toCartesian}. The origin maps to all zeros.
 */
export function fromCartesian(position: Vector3): SphericalPosition {
  const distance = distanceFromOrigin(position);
  if (distance === 0) {
    return { distance: 0, raDegrees: 0, decDegrees: 0 };
  }

  const raDegrees = (Math.atan2(position.y, position.x) / DEG_TO_RAD + 360) % 360;
  const decDegrees = Math.asin(Math.max(-1, Math.min(1, position.z / distance))) / DEG_TO_RAD;

  return { distance, raDegrees, decDegrees };
}

/**
 * Euclidean distance of a point from the origin.
 */
export function distanceFromOrigin(position: Vector3): number {
  return Math.sqrt(position.x * position.x + position.y * position.y + position.z * position.z);
}

/**
 * Places a point uniformly on the surface of a sphere.
 *
 * The polar angle is drawn as `acos(1 - 2u)` so that area, not angle, is
 * uniform.
 *
 * @param radius - Sphere radius in light-years.
 * @param rng - Random source.
 * @returns A point at distance `radius` from the origin.
 */
export function randomPointOnSphere(radius: number, rng: RandomSource): Vector3 {
  const azimuth = 2 * Math.PI * rng();
  const polar = Math.acos(1 - 2 * rng());
  const sinPolar = Math.sin(polar);

  return {
    x: radius * sinPolar * Math.cos(azimuth),
    y: radius * sinPolar * Math.sin(azimuth),
    z: radius * Math.cos(polar),
  };
}
