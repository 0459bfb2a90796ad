/**
 * Loads the effective configuration for a run.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import { mergeConfig, readEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config, PartialConfig } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Config file looked up in the working directory when none is named.
 */
export const DEFAULT_CONFIG_FILE = 'starcat.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string | undefined;
  /** Environment to read STARCAT_* variables from (defaults to process.env). */
  env?: EnvRecord;
  /** Values from command-line flags; they win over everything else. */
  overrides?: PartialConfig;
}

/**
 * The effective configuration and where it came from.
 */
export interface LoadedConfig {
  config: Config;
  /** Config file that was read, or null when only defaults applied. */
  source: string | null;
  /** Environment variables that changed a value. */
  appliedEnvVars: string[];
}

function readConfigFile(filePath: string): Config {
  let tomlContent: string;
  try {
    tomlContent = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
  }
  return parseConfig(tomlContent);
}

/**
 * Reads the config file (if any), applies environment and flag overrides,
 * and validates the result.
 *
 * @param options - Where to look and what to override.
 * @returns The validated configuration.
 * @throws ConfigParseError if a named config file is missing or malformed.
 * @throws EnvCoercionError if a STARCAT_* value cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 *
 * @example
 * ```typescript
 * const { config } = loadConfig({
 *   configPath: 'starcat.toml',
 *   overrides: { catalog: { seed: 7 } },
 * });
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  let base = getDefaultConfig();
  let source: string | null = null;

  if (options.configPath !== undefined) {
    if (!existsSync(options.configPath)) {
      throw new ConfigParseError(`Config file not found: '${options.configPath}'`);
    }
    base = readConfigFile(options.configPath);
    source = options.configPath;
  } else if (existsSync(DEFAULT_CONFIG_FILE)) {
    base = readConfigFile(DEFAULT_CONFIG_FILE);
    source = DEFAULT_CONFIG_FILE;
  }

  const { overrides: envOverrides, appliedVars } = readEnvOverrides(options.env ?? process.env);
  const config = mergeConfig(mergeConfig(base, envOverrides), options.overrides ?? {});

  assertConfigValid(config);

  return { config, source, appliedEnvVars: appliedVars };
}
