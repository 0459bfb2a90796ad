/**
 * Version command handler for the starcat CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CliCommandResult } from '../types.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));

function isVersionedPackage(value: unknown): value is { version: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Reads the version from package.json.
 *
 * Works from both `src/cli/commands` and `dist/cli/commands`.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(join(moduleDir, '../../../package.json'), 'utf-8')
    );
    return isVersionedPackage(packageJson) ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`starcat v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
