/**
 * CLI context construction for the starcat CLI.
 */

import type { CliContext } from './types.js';

/**
 * Decides whether output should be colored.
 *
 * Colors are used on a terminal unless NO_COLOR is set.
 *
 * @param env - Process environment.
 * @param isTty - Whether stderr is a terminal.
 * @returns True when ANSI colors should be emitted.
 */
export function shouldUseColors(env: Record<string, string | undefined>, isTty: boolean): boolean {
  return isTty && (env.NO_COLOR === undefined || env.NO_COLOR === '');
}

/**
 * Creates the context a command handler runs with.
 *
 * @param args - Arguments after the command name.
 * @param env - Process environment (defaults to process.env).
 * @returns The CLI context.
 */
export function createCliContext(
  args: string[],
  env: Record<string, string | undefined> = process.env
): CliContext {
  return {
    args,
    env,
    display: { colors: shouldUseColors(env, process.stderr.isTTY === true) },
  };
}
