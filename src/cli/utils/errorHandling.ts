/**
 * Shared error handling utilities for CLI commands.
 */

import { classifyError, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Renders a thrown value as a message with suggestions.
 *
 * @param error - Anything thrown by a command.
 * @param options - Display options.
 * @returns The formatted report.
 */
export function describeFailure(error: unknown, options: DisplayOptions): string {
  const message = error instanceof Error ? error.message : String(error);
  return formatErrorWithSuggestions(message, classifyError(error), options);
}

/**
 * Wraps a command handler with standard error handling.
 *
 * On success the process exits with the result's exit code; on error the
 * failure is printed with suggestions and the process exits with 1.
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Display options for error output.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      console.error(describeFailure(error, options));
      process.exit(1);
    }
  })();
}
