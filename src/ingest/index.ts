/**
 * Catalog ingestion: byte decoding and row splitting.
 *
 * @packageDocumentation
 */

export { decodeCatalogBuffer } from './decode.js';
export { readCatalogRows, splitCatalogLine, splitQuoteToggling } from './reader.js';
export type { CatalogReadResult, ReadCatalogOptions } from './reader.js';
