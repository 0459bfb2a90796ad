/**
 * Configuration types for starcat.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Input and output locations.
 */
export interface PathConfig {
  /** Source catalog file. */
  input: string;
  /** Existing directory the outputs are written into. */
  output_dir: string;
  /** File name of the star catalog inside output_dir. */
  catalog_file: string;
  /** File name of the companion mapping inside output_dir. */
  companions_file: string;
  /** File name of the visualization-schema catalog inside output_dir. */
  visualization_file: string;
}

/**
 * Distance filtering and parsec/light-year inference.
 */
export interface DistanceConfig {
  /** Stars farther than this (light-years) are excluded (default: 80). */
  max_distance_ly: number;
  /** Values below this are read as parsecs (default: 25). */
  parsec_threshold: number;
  /** Values below this are already light-years (default: 0.001). */
  small_value_epsilon: number;
  /** Whether a parsec marker converts values at or above the threshold (default: true). */
  require_explicit_marker: boolean;
}

/**
 * Catalog assembly settings.
 */
export interface CatalogConfig {
  /** Pad the catalog with filler stars up to this size; 0 disables padding. */
  target_size: number;
  /** Seed for the random source; unseeded when absent. */
  seed?: number | undefined;
  /** Leading lines of the source file to skip (default: 2). */
  header_rows: number;
  /** Also write the Name/Distance/RA/Dec/SpectralType file. */
  emit_visualization: boolean;
  /** Classification used for stars with none (default: "M5V"). */
  default_spectral_class: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from starcat.toml.
 */
export interface Config {
  paths: PathConfig;
  distance: DistanceConfig;
  catalog: CatalogConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  distance?: Partial<DistanceConfig>;
  catalog?: Partial<CatalogConfig>;
  logging?: Partial<LoggingConfig>;
}
