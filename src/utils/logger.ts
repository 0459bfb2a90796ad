/**
 * Structured logging utility for the catalog pipeline.
 *
 * Writes one JSON object per line to stderr so stdout stays free for
 * command output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-row diagnostics (fallbacks, skipped rows)
 * - `info`: run milestones and summaries
 * - `warn`: recoverable anomalies worth an operator's attention
 * - `error`: failures that abort the run
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "CatalogPipeline"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "row_skipped"
   */
  readonly event: string;

  /** Additional structured data associated with the log entry. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Sink the pipeline stages log through.
 *
 * {@link Logger} implements it; tests can pass a recording stub.
 */
export interface LogSink {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'CatalogPipeline', debugMode: true });
 * logger.info('catalog_built', { stars: 1421 });
 * logger.warn('duplicate_star_dropped', { name: 'Wolf 359' });
 * ```
 */
export class Logger implements LogSink {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Creates a logger for another component sharing this logger's debug setting.
   *
   * @param component - Name of the child component.
   * @returns A new logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes a log entry, replacing data that JSON cannot represent.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _data, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Logger that discards everything. Used when a caller does not supply one.
 */
export const silentLogger: LogSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
