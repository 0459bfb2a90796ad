/**
 * Splits decoded catalog text into rows.
 *
 * @packageDocumentation
 */

import { parse } from 'csv-parse/sync';
import type { CatalogRow } from '../catalog/types.js';
import { silentLogger, type LogSink } from '../utils/logger.js';

/**
 * Options for {@link readCatalogRows}.
 */
export interface ReadCatalogOptions {
  /** Leading lines to skip (title and column header rows). @defaultValue 2 */
  readonly headerRows?: number;
  readonly logger?: LogSink;
}

/**
 * Rows read from a catalog together with line counts.
 */
export interface CatalogReadResult {
  readonly rows: CatalogRow[];
  /** Non-blank data lines with fewer than two fields. */
  readonly tooFewFields: number;
  /** Non-blank lines after the header rows. */
  readonly dataLines: number;
}

/**
 * Splits a line on unquoted commas, dropping the quote characters.
 *
 * Used when a line is too malformed for the CSV parser.
 */
export function splitQuoteToggling(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current.trim());

  return fields;
}

/**
 * Splits one catalog line into trimmed fields.
 *
 * Quoted commas do not split. Lines the CSV parser rejects fall back to
 * {@link splitQuoteToggling}.
 *
 * @param line - One line of decoded text.
 * @param logger - Receives a warning when the fallback is used.
 * @returns The fields, possibly empty strings.
 */
export function splitCatalogLine(line: string, logger: LogSink = silentLogger): string[] {
  let records: unknown;
  try {
    records = parse(line, {
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    logger.warn('line_split_fallback', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return splitQuoteToggling(line);
  }

  if (!Array.isArray(records)) {
    return [];
  }
  const first: unknown = records[0];
  if (!Array.isArray(first)) {
    return [];
  }
  return first.map((field: unknown) => (typeof field === 'string' ? field : String(field)));
}

/**
 * Reads catalog rows from decoded text.
 *
 * Blank lines are ignored. The first five fields map to system, name,
 * distance, coordinates and spectral class; missing trailing fields are empty.
 *
 * @param text - Decoded catalog text with `\n` line endings.
 * @param options - Reader options.
 * @returns Rows in file order and skip counts.
 */
export function readCatalogRows(text: string, options: ReadCatalogOptions = {}): CatalogReadResult {
  const headerRows = options.headerRows ?? 2;
  const logger = options.logger ?? silentLogger;
  const lines = text.split('\n');

  const rows: CatalogRow[] = [];
  let tooFewFields = 0;
  let dataLines = 0;

  lines.forEach((line, index) => {
    if (index < headerRows || line.trim() === '') {
      return;
    }
    dataLines++;

    const fields = splitCatalogLine(line, logger);
    if (fields.length < 2) {
      tooFewFields++;
      logger.debug('row_skipped', { line: index + 1, reason: 'too_few_fields' });
      return;
    }

    rows.push({
      line: index + 1,
      system: fields[0] ?? '',
      name: fields[1] ?? '',
      distance: fields[2] ?? '',
      coordinates: fields[3] ?? '',
      spectralClass: fields[4] ?? '',
    });
  });

  return { rows, tooFewFields, dataLines };
}
