/**
 * Spectral classification and property synthesis.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_SPECTRAL_CLASS,
  SPECTRAL_RANGES,
  parseSpectralClass,
} from './spectral.js';
export type {
  Range,
  SpectralClassification,
  SpectralLetter,
  SpectralRanges,
} from './spectral.js';
export { drawProperties, interpolateProperties, synthesizeProperties } from './synthesizer.js';
export type { StellarProperties, SynthesizedStar } from './synthesizer.js';
