/**
 * Repairs mis-decoded characters in catalog text.
 *
 * The source catalog was written in a Mac single-byte encoding and has been
 * read back as Latin-1 (and, in older dumps, through `cat -v`), so the same
 * symbol shows up under several spellings.
 *
 * @packageDocumentation
 */

/**
 * A literal substring replacement.
 */
export type TextRepair = readonly [corrupted: string, repaired: string];

/**
 * Ordered replacement table. Multi-character markers come first because
 * their last character may itself be a table entry.
 */
export const ENCODING_REPAIRS: readonly TextRepair[] = [
  // cat -v meta notation for high bytes
  ['M-J', ' '],
  ['M-!', '°'],
  ['M-P', '-'],
  ['M-1', '±'],
  ['M-$', ''],
  ['M-`', ''],
  ['M-^', ''],
  // Mac Roman bytes decoded as Latin-1
  ['\u00ca', ' '],
  ['\u00a1', '\u00b0'],
  ['\u00d0', '-'],
  ['\u00a4', ''],
  ['\u00e0', ' '],
  ['\u00de', ''],
  ['\u00a0', ' '],
  ['\u2013', '-'],
  ['\u2014', '-'],
  ['\u2212', '-'],
  ['\ufffd', ' '],
  ['$', ''],
  ['"', ''],
];

/**
 * Applies {@link ENCODING_REPAIRS}, collapses whitespace runs to one space and trims.
 *
 * @param text - Raw field text; `undefined` is treated as empty.
 * @returns The repaired text.
 *
 * @example
 * ```typescript
 * normalizeText('Wolf M-J359'); // "Wolf 359"
 * normalizeText('-07M-! 00′'); // "-07° 00′"
 * ```
 */
export function normalizeText(text: string | undefined): string {
  if (text === undefined || text === '') {
    return '';
  }

  let repaired = text;
  for (const [corrupted, replacement] of ENCODING_REPAIRS) {
    repaired = repaired.replaceAll(corrupted, replacement);
  }

  return repaired.replace(/\s+/g, ' ').trim();
}
