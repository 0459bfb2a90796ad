/**
 * Build command handler for the starcat CLI.
 */

import { getEnvVarDocumentation, loadConfig } from '../../config/index.js';
import { runCatalogBuild } from '../../pipeline/index.js';
import { Logger } from '../../utils/logger.js';
import { parseBuildArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Help text for `starcat build`.
 */
export const BUILD_HELP = `
USAGE: starcat build [options]

Reads the source catalog, resolves distances and positions, groups
companions, synthesizes stellar properties and writes the catalog and
companion mapping CSV files.

OPTIONS:
  --config <file>         Config file (default: ./starcat.toml if present)
  --input <file>          Source catalog
  --output-dir <dir>      Existing directory for the outputs
  --target-size <n>       Pad with procedural stars up to n records
  --seed <n>              Seed the random source for a reproducible run
  --emit-visualization    Also write Name/Distance/RA/Dec/SpectralType
  --debug                 Log debug entries to stderr

EXAMPLES:
  starcat build
  starcat build --input stellar_data/star-ref.csv --output-dir out
  starcat build --seed 42 --target-size 1500 --emit-visualization
`;

/**
 * Build help followed by the STARCAT_* variables the command reads.
 *
 * @returns The full help text.
 */
export function buildHelpText(): string {
  const docs = Object.entries(getEnvVarDocumentation());
  const width = Math.max(...docs.map(([name]) => name.length));
  const lines = docs.map(
    ([name, doc]) => `  ${name.padEnd(width)}  ${doc.description} (${doc.type})`
  );
  return `${BUILD_HELP}\nENVIRONMENT:\n${lines.join('\n')}\n`;
}

/**
 * Handles the build command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 * @throws CliUsageError, configuration errors, or CatalogIoError.
 */
export async function handleBuildCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseBuildArgs(context.args);
  if (args.help) {
    console.log(buildHelpText());
    return { exitCode: 0 };
  }

  const { config, source, appliedEnvVars } = loadConfig({
    configPath: args.configPath,
    env: context.env,
    overrides: args.overrides,
  });

  const logger = new Logger({ component: 'starcat', debugMode: config.logging.debug });
  logger.debug('config_loaded', { source, appliedEnvVars });

  const { build, outputs } = await runCatalogBuild(config, {
    logger: logger.child('pipeline'),
  });

  const fillerNote =
    build.stats.fillerStars > 0 ? `, ${String(build.stats.fillerStars)} procedural` : '';
  console.log(
    `Catalog written: ${outputs.catalogPath} (${String(build.stars.length)} stars${fillerNote})`
  );
  console.log(
    `Companions written: ${outputs.companionsPath} (${String(build.companions.size)} mappings)`
  );
  if (outputs.visualizationPath !== undefined) {
    console.log(`Visualization written: ${outputs.visualizationPath}`);
  }

  return { exitCode: 0 };
}
