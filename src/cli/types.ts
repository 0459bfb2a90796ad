/**
 * CLI types and interfaces for the starcat CLI.
 */

/**
 * Terminal rendering options.
 */
export interface DisplayOptions {
  /**
   * Whether to use ANSI colors in output.
   */
  colors: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Arguments after the command name.
   */
  args: string[];

  /**
   * Rendering options for messages.
   */
  display: DisplayOptions;

  /**
   * Environment the command reads STARCAT_* overrides from.
   */
  env: Record<string, string | undefined>;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}
