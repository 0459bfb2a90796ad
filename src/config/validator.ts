/**
 * Semantic validation for configuration values.
 *
 * Checks what the TOML types cannot express: distances are positive,
 * counts are non-negative integers and the default classification parses.
 * Whether the input and output locations exist is checked when the catalog
 * is read and written.
 *
 * @packageDocumentation
 */

import { parseSpectralClass } from '../stellar/index.js';
import type { CatalogConfig, Config, DistanceConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/** Largest seed that survives the generator's 32-bit truncation unchanged. */
const MAX_SEED = 0xffffffff;

function validatePositive(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive number, got ${String(value)}`,
    });
  }
}

/**
 * Validates that a value is a non-negative integer.
 *
 * @param value - The value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validateNonNegativeInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a non-negative integer, got ${String(value)}`,
    });
  }
}

function validateNonEmpty(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (value.trim() === '') {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
  }
}

/**
 * Validates the distance section.
 *
 * @param distance - The distance configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateDistance(distance: DistanceConfig, errors: ValidationError[]): void {
  validatePositive(distance.max_distance_ly, 'distance.max_distance_ly', errors);
  validatePositive(distance.parsec_threshold, 'distance.parsec_threshold', errors);

  if (!Number.isFinite(distance.small_value_epsilon) || distance.small_value_epsilon < 0) {
    errors.push({
      field: 'distance.small_value_epsilon',
      value: distance.small_value_epsilon,
      message: `'distance.small_value_epsilon' must be zero or greater, got ${String(distance.small_value_epsilon)}`,
    });
  } else if (distance.small_value_epsilon >= distance.parsec_threshold) {
    errors.push({
      field: 'distance.small_value_epsilon',
      value: distance.small_value_epsilon,
      message: `'distance.small_value_epsilon' must be below 'distance.parsec_threshold' (${String(distance.parsec_threshold)})`,
    });
  }
}

/**
 * Validates the catalog section.
 *
 * @param catalog - The catalog configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateCatalog(catalog: CatalogConfig, errors: ValidationError[]): void {
  validateNonNegativeInteger(catalog.target_size, 'catalog.target_size', errors);
  validateNonNegativeInteger(catalog.header_rows, 'catalog.header_rows', errors);

  if (catalog.seed !== undefined) {
    if (!Number.isInteger(catalog.seed) || catalog.seed < 0 || catalog.seed > MAX_SEED) {
      errors.push({
        field: 'catalog.seed',
        value: catalog.seed,
        message: `'catalog.seed' must be an integer between 0 and ${String(MAX_SEED)}, got ${String(catalog.seed)}`,
      });
    }
  }

  if (parseSpectralClass(catalog.default_spectral_class) === null) {
    errors.push({
      field: 'catalog.default_spectral_class',
      value: catalog.default_spectral_class,
      message: `'catalog.default_spectral_class' is not a recognized classification: '${catalog.default_spectral_class}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateNonEmpty(config.paths.input, 'paths.input', errors);
  validateNonEmpty(config.paths.output_dir, 'paths.output_dir', errors);
  validateNonEmpty(config.paths.catalog_file, 'paths.catalog_file', errors);
  validateNonEmpty(config.paths.companions_file, 'paths.companions_file', errors);
  validateNonEmpty(config.paths.visualization_file, 'paths.visualization_file', errors);

  validateDistance(config.distance, errors);
  validateCatalog(config.catalog, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
