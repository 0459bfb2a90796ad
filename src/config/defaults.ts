/**
 * Default configuration values for starcat.toml.
 *
 * @packageDocumentation
 */

import type { CatalogConfig, Config, DistanceConfig, LoggingConfig, PathConfig } from './types.js';

/**
 * Default paths relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  input: 'stellar_data/star-ref.csv',
  output_dir: 'stellar_data',
  catalog_file: 'stars.csv',
  companions_file: 'companion_mapping.csv',
  visualization_file: 'stars_visualization.csv',
};

/**
 * Default distance policy: an 80 ly sphere and a 25 pc unit threshold.
 */
export const DEFAULT_DISTANCE: DistanceConfig = {
  max_distance_ly: 80,
  parsec_threshold: 25,
  small_value_epsilon: 0.001,
  require_explicit_marker: true,
};

/**
 * Default catalog settings (no padding, unseeded).
 */
export const DEFAULT_CATALOG: CatalogConfig = {
  target_size: 0,
  header_rows: 2,
  emit_visualization: false,
  default_spectral_class: 'M5V',
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  distance: DEFAULT_DISTANCE,
  catalog: DEFAULT_CATALOG,
  logging: DEFAULT_LOGGING,
};
