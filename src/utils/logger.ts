/**
 * Structured logging utility.
 *
 * Emits one JSON object per line, by default to stderr, so that solver
 * diagnostics never mix with the YES/NO answer on stdout.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: search internals, only emitted in debug mode
 * - `info`: normal operation
 * - `warn`: recoverable problems such as an unreadable config file
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated the entry.
   * @example "LabellingSearch"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "search_finished"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { nodes: 12, labellings: 3 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;

  /**
   * Destination for serialized lines (each ends with a newline).
   * @defaultValue writes to process.stderr
   */
  readonly write?: ((line: string) => void) | undefined;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

function serialize(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Structured logger producing JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'LabellingSearch', debugMode: true });
 * logger.debug('labelling_found', { extension: ['a', 'c'] });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the derived component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

  /** Whether debug entries are emitted. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
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
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.write(serialize(entry) + '\n');
  }
}

/**
 * Default logger for the solver core. Debug mode is off, so the core stays
 * silent unless a caller passes its own logger.
 */
export const logger = new Logger({ component: 'argsolve', debugMode: false });
