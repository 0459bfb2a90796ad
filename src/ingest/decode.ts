/**
 * Byte-level decoding of the source catalog.
 *
 * @packageDocumentation
 */

const UTF8_BOM_AS_LATIN1 = '\u00ef\u00bb\u00bf';

/**
 * Decodes catalog bytes as Latin-1 and normalizes line endings to `\n`.
 *
 * Latin-1 maps every byte to a character, so decoding cannot fail; bytes
 * written in another single-byte encoding come out as the mojibake that
 * the text normalizer repairs.
 *
 * @param bytes - Raw file contents.
 * @returns Decoded text.
 */
export function decodeCatalogBuffer(bytes: Uint8Array): string {
  let text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');

  if (text.startsWith(UTF8_BOM_AS_LATIN1)) {
    text = text.slice(UTF8_BOM_AS_LATIN1.length);
  }

  return text.replace(/\r\n?/g, '\n');
}
