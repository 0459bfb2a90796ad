/**
 * Error suggestion system for the starcat CLI.
 *
 * Maps failures to a category and prints contextual suggestions next to
 * the message.
 *
 * @packageDocumentation
 */

import { CatalogIoError } from '../catalog/index.js';
import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import type { DisplayOptions } from './types.js';

/**
 * Categories of fatal errors.
 */
export type ErrorType =
  | 'usage_error'
  | 'config_error'
  | 'input_unreadable'
  | 'output_unwritable'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** File or directory involved. */
    path?: string;
    /** Configuration field involved. */
    field?: string;
    /** Environment variable involved. */
    envVar?: string;
  };
}

/**
 * Error raised for malformed command lines.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - What was wrong with the arguments.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage_error: [
    {
      text: 'Check the command and flag spelling',
      action: 'starcat help',
    },
    {
      text: 'Flags that take a value need it as the next argument',
      action: 'starcat build --seed 42',
    },
  ],

  config_error: [
    {
      text: 'Check starcat.toml for typos and wrong value types',
    },
    {
      text: 'Check STARCAT_* environment variables for invalid values',
      action: 'env | grep STARCAT_',
    },
    {
      text: 'Run without a config file to use the defaults',
      action: 'starcat build --input <file> --output-dir <dir>',
    },
  ],

  input_unreadable: [
    {
      text: 'Verify the input catalog path',
      action: 'starcat build --input <file>',
    },
    {
      text: 'Check the file permissions',
      action: 'ls -l <file>',
    },
  ],

  output_unwritable: [
    {
      text: 'The output directory is never created; create it first',
      action: 'mkdir -p <dir>',
    },
    {
      text: 'Check that the directory is writable',
      action: 'ls -ld <dir>',
    },
    {
      text: 'Write somewhere else',
      action: 'starcat build --output-dir <dir>',
    },
  ],

  unknown: [
    {
      text: 'Rerun with debug logging for more detail',
      action: 'starcat build --debug',
    },
  ],
};

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('unknown flag') ||
    lowerMessage.includes('unknown command') ||
    lowerMessage.includes('requires a value')
  ) {
    return 'usage_error';
  }

  if (
    lowerMessage.includes('config') ||
    lowerMessage.includes('toml') ||
    lowerMessage.includes('environment variable')
  ) {
    return 'config_error';
  }

  if (lowerMessage.includes('output directory') || lowerMessage.includes('cannot write')) {
    return 'output_unwritable';
  }

  if (lowerMessage.includes('cannot read')) {
    return 'input_unreadable';
  }

  return 'unknown';
}

/**
 * Builds the error context for a thrown value.
 *
 * @param error - Anything thrown by a command.
 * @returns Error type and details.
 */
export function classifyError(error: unknown): ErrorContext {
  if (error instanceof CliUsageError) {
    return { errorType: 'usage_error' };
  }
  if (error instanceof ConfigParseError || error instanceof ConfigValidationError) {
    const field = error instanceof ConfigValidationError ? error.errors[0]?.field : undefined;
    return { errorType: 'config_error', ...(field !== undefined ? { details: { field } } : {}) };
  }
  if (error instanceof EnvCoercionError) {
    return { errorType: 'config_error', details: { envVar: error.envVar } };
  }
  if (error instanceof CatalogIoError) {
    return {
      errorType: error.operation === 'read' ? 'input_unreadable' : 'output_unwritable',
      details: { path: error.path },
    };
  }
  if (error instanceof PathValidationError) {
    return { errorType: 'config_error' };
  }
  return { errorType: inferErrorType(error instanceof Error ? error.message : String(error)) };
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = ERROR_SUGGESTIONS[errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.path !== undefined) {
    result += `\n  ${yellowCode}Path:${resetCode} ${context.details.path}`;
  }
  if (context.details?.field !== undefined) {
    result += `\n  ${yellowCode}Field:${resetCode} ${context.details.field}`;
  }
  if (context.details?.envVar !== undefined) {
    result += `\n  ${yellowCode}Variable:${resetCode} ${context.details.envVar}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
