/**
 * Environment variable overrides for configuration.
 *
 * STARCAT_* variables override values from starcat.toml at runtime.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { type: 'string'; description: string; apply: (target: PartialConfig, value: string) => void }
  | { type: 'number'; description: string; apply: (target: PartialConfig, value: number) => void }
  | {
      type: 'boolean';
      description: string;
      apply: (target: PartialConfig, value: boolean) => void;
    };

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: STARCAT_<SECTION>_<FIELD> maps to config.<section>.<field>, with
 * shortcuts for the settings changed most often.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  STARCAT_INPUT: {
    type: 'string',
    description: 'Override the source catalog path (shortcut for STARCAT_PATHS_INPUT)',
    apply: (t, v) => {
      t.paths = { ...t.paths, input: v };
    },
  },
  STARCAT_OUTPUT_DIR: {
    type: 'string',
    description: 'Override the output directory (shortcut for STARCAT_PATHS_OUTPUT_DIR)',
    apply: (t, v) => {
      t.paths = { ...t.paths, output_dir: v };
    },
  },
  STARCAT_SEED: {
    type: 'number',
    description: 'Seed the random source (shortcut for STARCAT_CATALOG_SEED)',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, seed: v };
    },
  },
  STARCAT_TARGET_SIZE: {
    type: 'number',
    description: 'Pad the catalog to this size (shortcut for STARCAT_CATALOG_TARGET_SIZE)',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, target_size: v };
    },
  },
  STARCAT_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (shortcut for STARCAT_LOGGING_DEBUG)',
    apply: (t, v) => {
      t.logging = { ...t.logging, debug: v };
    },
  },

  // Paths
  STARCAT_PATHS_INPUT: {
    type: 'string',
    description: 'Override the source catalog path',
    apply: (t, v) => {
      t.paths = { ...t.paths, input: v };
    },
  },
  STARCAT_PATHS_OUTPUT_DIR: {
    type: 'string',
    description: 'Override the output directory',
    apply: (t, v) => {
      t.paths = { ...t.paths, output_dir: v };
    },
  },
  STARCAT_PATHS_CATALOG_FILE: {
    type: 'string',
    description: 'Override the catalog file name',
    apply: (t, v) => {
      t.paths = { ...t.paths, catalog_file: v };
    },
  },
  STARCAT_PATHS_COMPANIONS_FILE: {
    type: 'string',
    description: 'Override the companion mapping file name',
    apply: (t, v) => {
      t.paths = { ...t.paths, companions_file: v };
    },
  },
  STARCAT_PATHS_VISUALIZATION_FILE: {
    type: 'string',
    description: 'Override the visualization file name',
    apply: (t, v) => {
      t.paths = { ...t.paths, visualization_file: v };
    },
  },

  // Distance
  STARCAT_DISTANCE_MAX_DISTANCE_LY: {
    type: 'number',
    description: 'Override the maximum distance in light-years',
    apply: (t, v) => {
      t.distance = { ...t.distance, max_distance_ly: v };
    },
  },
  STARCAT_DISTANCE_PARSEC_THRESHOLD: {
    type: 'number',
    description: 'Override the value below which distances are read as parsecs',
    apply: (t, v) => {
      t.distance = { ...t.distance, parsec_threshold: v };
    },
  },
  STARCAT_DISTANCE_SMALL_VALUE_EPSILON: {
    type: 'number',
    description: 'Override the value below which distances are kept as-is',
    apply: (t, v) => {
      t.distance = { ...t.distance, small_value_epsilon: v };
    },
  },
  STARCAT_DISTANCE_REQUIRE_EXPLICIT_MARKER: {
    type: 'boolean',
    description: 'Whether a parsec marker is needed to convert values above the threshold',
    apply: (t, v) => {
      t.distance = { ...t.distance, require_explicit_marker: v };
    },
  },

  // Catalog
  STARCAT_CATALOG_TARGET_SIZE: {
    type: 'number',
    description: 'Override the target catalog size (0 disables padding)',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, target_size: v };
    },
  },
  STARCAT_CATALOG_SEED: {
    type: 'number',
    description: 'Seed the random source',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, seed: v };
    },
  },
  STARCAT_CATALOG_HEADER_ROWS: {
    type: 'number',
    description: 'Override the number of leading lines to skip',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, header_rows: v };
    },
  },
  STARCAT_CATALOG_EMIT_VISUALIZATION: {
    type: 'boolean',
    description: 'Also write the visualization-schema file (true/false)',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, emit_visualization: v };
    },
  },
  STARCAT_CATALOG_DEFAULT_SPECTRAL_CLASS: {
    type: 'string',
    description: 'Override the classification used for stars with none',
    apply: (t, v) => {
      t.catalog = { ...t.catalog, default_spectral_class: v };
    },
  },

  // Logging
  STARCAT_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (true/false)',
    apply: (t, v) => {
      t.logging = { ...t.logging, debug: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts true/1/yes/on and false/0/no/off, case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const normalized = value.trim().toLowerCase();

  if (TRUTHY.includes(normalized)) {
    return true;
  }
  if (FALSY.includes(normalized)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Coerces the raw value and writes it into the overrides.
 */
function applyMapping(
  target: PartialConfig,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(target, value);
      return;
    case 'number':
      mapping.apply(target, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(target, coerceToBoolean(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads STARCAT_* environment variables into a partial configuration.
 *
 * Full-path variables are read after shortcuts, so they win when both are set.
 * Empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Result containing overrides and the variables applied.
 * @throws EnvCoercionError if a value cannot be coerced to its type.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ STARCAT_SEED: '42' });
 * overrides.catalog?.seed; // 42
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    applyMapping(overrides, mapping, value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    paths: { ...base.paths, ...partial.paths },
    distance: { ...base.distance, ...partial.distance },
    catalog: { ...base.catalog, ...partial.catalog },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
