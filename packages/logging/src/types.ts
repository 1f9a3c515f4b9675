/**
 * Logging types
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Record forwarded to sinks after filters pass
 */
export interface LogEntry {
  category: string;
  level: LogLevel;
  /** Message with interpolation arguments applied */
  message: string;
  /** Message as passed, before interpolation */
  template: string;
  attributes: Record<string, unknown>;
  /** Child logger bindings other than `category` */
  scope: Record<string, unknown>;
  /** Epoch milliseconds */
  time: number;
  error?: Error;
}

/**
 * Extra log destination (OpenTelemetry bridge, Application Insights traces)
 */
export interface LogSink {
  readonly name: string;
  emit(entry: LogEntry): void;
  flush?(): Promise<void>;
}

/**
 * Returns false to drop a record
 */
export type LogFilterPredicate = (level: LogLevel, category: string) => boolean;

export interface LogFilterRule {
  /** Category prefix, optionally with one `*` wildcard */
  pattern: string;
  predicate: LogFilterPredicate;
}
