/**
 * TOML configuration parser for starcat.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_CATALOG,
  DEFAULT_CONFIG,
  DEFAULT_DISTANCE,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
} from './defaults.js';
import type { CatalogConfig, Config, DistanceConfig, LoggingConfig, PathConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a table from the parsed document.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function getSection(root: RawSection, name: string): RawSection | undefined {
  const value = root[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Parses path configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for paths section.
 * @returns Validated path configuration merged with defaults.
 */
function parsePaths(raw: RawSection | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('input' in raw) {
    result.input = validateString(raw.input, 'paths.input');
  }
  if ('output_dir' in raw) {
    result.output_dir = validateString(raw.output_dir, 'paths.output_dir');
  }
  if ('catalog_file' in raw) {
    result.catalog_file = validateString(raw.catalog_file, 'paths.catalog_file');
  }
  if ('companions_file' in raw) {
    result.companions_file = validateString(raw.companions_file, 'paths.companions_file');
  }
  if ('visualization_file' in raw) {
    result.visualization_file = validateString(
      raw.visualization_file,
      'paths.visualization_file'
    );
  }

  return result;
}

/**
 * Parses distance configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for distance section.
 * @returns Validated distance configuration merged with defaults.
 */
function parseDistance(raw: RawSection | undefined): DistanceConfig {
  const result: DistanceConfig = { ...DEFAULT_DISTANCE };
  if (raw === undefined) {
    return result;
  }

  if ('max_distance_ly' in raw) {
    result.max_distance_ly = validateNumber(raw.max_distance_ly, 'distance.max_distance_ly');
  }
  if ('parsec_threshold' in raw) {
    result.parsec_threshold = validateNumber(raw.parsec_threshold, 'distance.parsec_threshold');
  }
  if ('small_value_epsilon' in raw) {
    result.small_value_epsilon = validateNumber(
      raw.small_value_epsilon,
      'distance.small_value_epsilon'
    );
  }
  if ('require_explicit_marker' in raw) {
    result.require_explicit_marker = validateBoolean(
      raw.require_explicit_marker,
      'distance.require_explicit_marker'
    );
  }

  return result;
}

/**
 * Parses catalog configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for catalog section.
 * @returns Validated catalog configuration merged with defaults.
 */
function parseCatalog(raw: RawSection | undefined): CatalogConfig {
  const result: CatalogConfig = { ...DEFAULT_CATALOG };
  if (raw === undefined) {
    return result;
  }

  if ('target_size' in raw) {
    result.target_size = validateNumber(raw.target_size, 'catalog.target_size');
  }
  if ('seed' in raw) {
    result.seed = validateNumber(raw.seed, 'catalog.seed');
  }
  if ('header_rows' in raw) {
    result.header_rows = validateNumber(raw.header_rows, 'catalog.header_rows');
  }
  if ('emit_visualization' in raw) {
    result.emit_visualization = validateBoolean(
      raw.emit_visualization,
      'catalog.emit_visualization'
    );
  }
  if ('default_spectral_class' in raw) {
    result.default_spectral_class = validateString(
      raw.default_spectral_class,
      'catalog.default_spectral_class'
    );
  }

  return result;
}

/**
 * Parses logging configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for logging section.
 * @returns Validated logging configuration merged with defaults.
 */
function parseLogging(raw: RawSection | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Only types are checked here; see `validateConfig` for value ranges.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [distance]
 * parsec_threshold = 50
 *
 * [catalog]
 * target_size = 1400
 * seed = 7
 * `);
 * console.log(config.distance.parsec_threshold); // 50
 * console.log(config.catalog.header_rows); // 2
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: unknown;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError('Invalid TOML document: expected a table at the top level');
  }

  return {
    paths: parsePaths(getSection(parsed, 'paths')),
    distance: parseDistance(getSection(parsed, 'distance')),
    catalog: parseCatalog(getSection(parsed, 'catalog')),
    logging: parseLogging(getSection(parsed, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    distance: { ...DEFAULT_CONFIG.distance },
    catalog: { ...DEFAULT_CONFIG.catalog },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
