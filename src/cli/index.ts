#!/usr/bin/env node

/**
 * starcat CLI entry point.
 */

import { createCliContext } from './app.js';
import { buildHelpText, handleBuildCommand } from './commands/build.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
starcat v${getVersionFromPackageJson()}

Builds a 3D catalog of nearby stars from a reference list.

USAGE:
  starcat <command> [options]

COMMANDS:
  build       Build the star catalog and companion mapping
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  starcat build                      Build using ./starcat.toml or defaults
  starcat build --seed 42            Reproducible build
  starcat help build                 Show build options
`;
  console.log(helpText);
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "starcat help" for usage information.');
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  if (commandName === 'build') {
    console.log(buildHelpText());
    return;
  }
  console.error(`Unknown command: ${commandName}`);
  console.error('\nRun "starcat help" to see all available commands.');
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      handleVersionCommand();
      process.exit(0);
      break;

    case 'build': {
      const context = createCliContext(commandArgs);
      withErrorHandling(() => handleBuildCommand(context), context.display);
      break;
    }

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}
