/**
 * Distance extraction and parsec/light-year disambiguation.
 *
 * The catalog mixes parsecs and light-years without a consistent unit
 * marker, so the unit is inferred by {@link DistancePolicy}. The inference
 * is a heuristic: stars close to `parsecThreshold` can be misclassified.
 *
 * @packageDocumentation
 */

import { normalizeText } from '../normalize/index.js';

/**
 * Light-years per parsec.
 */
export const PARSEC_IN_LIGHT_YEARS = 3.26156;

/**
 * Tunable unit-inference policy.
 */
export interface DistancePolicy {
  /** Values strictly below this are read as parsecs. */
  readonly parsecThreshold: number;
  /** Values strictly below this are already light-years (the Sun's placeholder). */
  readonly smallValueEpsilon: number;
  /**
   * When true, values at or above the threshold are converted only if a
   * parsec marker is present. When false they are always light-years.
   */
  readonly requireExplicitMarker: boolean;
}

/**
 * Default policy: 25 pc threshold with explicit markers honoured above it.
 */
export const DEFAULT_DISTANCE_POLICY: DistancePolicy = {
  parsecThreshold: 25,
  smallValueEpsilon: 0.001,
  requireExplicitMarker: true,
};

const SENTINEL = 'n/a';
const NUMBER_PATTERN = /\d+(?:\.\d*)?|\.\d+/;
const PARSEC_MARKER_PATTERN = /parsec|\bpc\b|±|\+\/-/i;

/**
 * Extracts the first number in a distance string.
 *
 * @param raw - Distance field as read from the catalog.
 * @returns The number, or `null` when the field is empty, `N/A`, or has no digits.
 */
export function extractDistanceValue(raw: string | undefined): number | null {
  const text = normalizeText(raw);
  if (text === '' || text.toLowerCase() === SENTINEL) {
    return null;
  }

  const match = NUMBER_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Reports whether a distance string carries a parsec marker.
 */
export function hasParsecMarker(raw: string | undefined): boolean {
  return PARSEC_MARKER_PATTERN.test(normalizeText(raw));
}

/**
 * Resolves a catalog distance string to light-years.
 *
 * @param raw - Distance field as read from the catalog.
 * @param policy - Unit-inference policy.
 * @returns Distance in light-years, or `null` when no distance can be read.
 *
 * @example
 * ```typescript
 * resolveDistance('4.24');          // 13.829 (read as parsecs)
 * resolveDistance('0.0000158');     // 0.0000158 (already light-years)
 * resolveDistance('30.1 ± 0.2');    // 98.173 (marker present)
 * resolveDistance('30.1');          // 30.1
 * resolveDistance('N/A');           // null
 * ```
 */
export function resolveDistance(
  raw: string | undefined,
  policy: DistancePolicy = DEFAULT_DISTANCE_POLICY
): number | null {
  const value = extractDistanceValue(raw);
  if (value === null) {
    return null;
  }

  if (value < policy.smallValueEpsilon) {
    return value;
  }

  if (value < policy.parsecThreshold) {
    return value * PARSEC_IN_LIGHT_YEARS;
  }

  if (policy.requireExplicitMarker && hasParsecMarker(raw)) {
    return value * PARSEC_IN_LIGHT_YEARS;
  }

  return value;
}
