/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that stdout stays reserved for
 * the conversation with the candidate.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, only written in debug mode
 * - `info`: normal session progress
 * - `warn`: degraded but recoverable conditions (fallbacks, failed experts)
 * - `error`: failures that abort an operation
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

  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "InterviewEngine"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "turn_sealed"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { turnId: 3, difficulty: 4 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;

  /**
   * Where lines are written.
   * @defaultValue process.stderr
   */
  readonly sink?: LogSink | undefined;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'InterviewEngine', debugMode: true });
 * logger.info('session_started', { participant: 'Alex' });
 * logger.warn('expert_failed', { role: 'qa' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values cannot be serialized.
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Logger that discards every entry. Used as the default for library classes.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => {
    /* discard */
  },
});
