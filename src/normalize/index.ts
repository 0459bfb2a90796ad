/**
 * Text normalization for catalog fields.
 *
 * @packageDocumentation
 */

export { ENCODING_REPAIRS, normalizeText } from './text.js';
export type { TextRepair } from './text.js';
