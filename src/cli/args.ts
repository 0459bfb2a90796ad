/**
 * Argument parsing for `starcat build`.
 */

import type { PartialConfig } from '../config/index.js';
import { CliUsageError } from './errors.js';

/**
 * Parsed `build` arguments.
 */
export interface BuildArgs {
  /** Explicit config file from `--config`. */
  configPath: string | undefined;
  /** Values set by flags; they override file and environment values. */
  overrides: PartialConfig;
  /** True when `--help` or `-h` was passed. */
  help: boolean;
}

function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`Flag '${flag}' requires a value`);
  }
  return value;
}

function parseInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new CliUsageError(`Flag '${flag}' requires an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Parses command-line arguments for the build command.
 *
 * @param args - Arguments after `build`.
 * @returns Parsed options.
 * @throws CliUsageError for unknown flags or missing and malformed values.
 *
 * @example
 * ```typescript
 * parseBuildArgs(['--seed', '42', '--debug']);
 * // {
 *   configPath: undefined,
 *   overrides: { catalog: { seed: 42 }, logging: { debug: true } },
 *   help: false,
 * }
 * ```
 */
export function parseBuildArgs(args: readonly string[]): BuildArgs {
  let configPath: string | undefined;
  let help = false;
  const overrides: PartialConfig = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--config':
        configPath = takeValue(args, i, arg);
        i++;
        break;
      case '--input':
        overrides.paths = { ...overrides.paths, input: takeValue(args, i, arg) };
        i++;
        break;
      case '--output-dir':
        overrides.paths = { ...overrides.paths, output_dir: takeValue(args, i, arg) };
        i++;
        break;
      case '--target-size':
        overrides.catalog = {
          ...overrides.catalog,
          target_size: parseInteger(takeValue(args, i, arg), arg),
        };
        i++;
        break;
      case '--seed':
        overrides.catalog = {
          ...overrides.catalog,
          seed: parseInteger(takeValue(args, i, arg), arg),
        };
        i++;
        break;
      case '--emit-visualization':
        overrides.catalog = { ...overrides.catalog, emit_visualization: true };
        break;
      case '--debug':
        overrides.logging = { ...overrides.logging, debug: true };
        break;
      default:
        throw new CliUsageError(`Unknown flag for 'build': ${String(arg)}`);
    }
  }

  return { configPath, overrides, help };
}
