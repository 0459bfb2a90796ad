/**
 * Distance and position resolution for catalog rows.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_DISTANCE_POLICY,
  PARSEC_IN_LIGHT_YEARS,
  extractDistanceValue,
  hasParsecMarker,
  resolveDistance,
} from './distance.js';
export type { DistancePolicy } from './distance.js';
export {
  distanceFromOrigin,
  fromCartesian,
  parseCoordinates,
  randomPointOnSphere,
  toCartesian,
} from './coordinates.js';
export type { EquatorialCoordinates, SphericalPosition, Vector3 } from './coordinates.js';
