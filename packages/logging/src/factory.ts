import { format } from 'util';
import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { isEnabled } from './filters.js';
import { isLogLevel, type LogEntry, type LogFilterPredicate, type LogFilterRule, type LogLevel, type LogSink } from './types.js';

const DEFAULT_REDACT_PATHS = [
  '*.secret',
  '*.password',
  '*.masterKey',
  '*.connectionString',
  'key.value',
];

const ROOT_CATEGORY = 'Host';

export interface LoggerFactoryOptions {
  level?: LogLevel;
  destination?: DestinationStream;
  filters?: readonly LogFilterRule[];
  sinks?: readonly LogSink[];
  /** Extra pino redact paths */
  redact?: readonly string[];
  name?: string;
}

/**
 * Owns the root pino logger. Category loggers are children carrying a
 * `category` binding; filters and sinks run in the `logMethod` hook so
 * predicates see runtime state at log time.
 */
export class LoggerFactory {
  readonly root: Logger;
  private readonly filters: LogFilterRule[];
  private readonly sinks: LogSink[];

  constructor(options: LoggerFactoryOptions = {}) {
    const filters: LogFilterRule[] = [...(options.filters ?? [])];
    const sinks: LogSink[] = [...(options.sinks ?? [])];
    this.filters = filters;
    this.sinks = sinks;

    const loggerOptions: LoggerOptions = {
      name: options.name ?? 'fnhost',
      level: options.level ?? readLevel(process.env.LOG_LEVEL),
      formatters: {
        level: (label) => ({ level: label }),
      },
      redact: {
        paths: [...DEFAULT_REDACT_PATHS, ...(options.redact ?? [])],
        censor: '[REDACTED]',
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      hooks: {
        logMethod(args, method, level) {
          const bindings = this.bindings();
          const category = categoryOf(bindings);
          const label = this.levels.labels[level];
          const logLevel: LogLevel = isLogLevel(label) ? label : 'info';

          if (!isEnabled(filters, category, logLevel)) {
            return;
          }

          method.apply(this, args);

          if (sinks.length === 0) {
            return;
          }

          const entry = toEntry(category, logLevel, args, bindings);
          for (const sink of sinks) {
            try {
              sink.emit(entry);
            } catch (err) {
              method.call(this, { err, sink: sink.name }, 'Log sink failed');
            }
          }
        },
      },
    };

    this.root = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
  }

  createLogger(category: string): Logger {
    return this.root.child({ category });
  }

  addFilter(pattern: string, predicate: LogFilterPredicate): void {
    this.filters.push({ pattern, predicate });
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  async flush(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.flush?.()));
    this.root.flush();
  }
}

/**
 * Collects filters and sinks before the factory exists, so telemetry setup
 * can contribute to logging during host bootstrap.
 */
export class LoggingBuilder {
  private readonly filters: LogFilterRule[] = [];
  private readonly sinks: LogSink[] = [];
  private level?: LogLevel;
  private destination?: DestinationStream;

  addFilter(pattern: string, predicate: LogFilterPredicate): this {
    this.filters.push({ pattern, predicate });
    return this;
  }

  addSink(sink: LogSink): this {
    this.sinks.push(sink);
    return this;
  }

  setMinimumLevel(level: LogLevel): this {
    this.level = level;
    return this;
  }

  setDestination(destination: DestinationStream): this {
    this.destination = destination;
    return this;
  }

  get registeredSinks(): readonly LogSink[] {
    return this.sinks;
  }

  get registeredFilters(): readonly LogFilterRule[] {
    return this.filters;
  }

  build(): LoggerFactory {
    return new LoggerFactory({
      level: this.level,
      destination: this.destination,
      filters: this.filters,
      sinks: this.sinks,
    });
  }
}

/**
 * Logger that writes nothing; for components constructed without a factory.
 */
export function createNullLogger(): Logger {
  return pino({ enabled: false });
}

function readLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase();
  return isLogLevel(lower) ? lower : 'info';
}

function categoryOf(bindings: Record<string, unknown>): string {
  const category: unknown = bindings.category;
  return typeof category === 'string' ? category : ROOT_CATEGORY;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEntry(
  category: string,
  level: LogLevel,
  args: readonly unknown[],
  bindings: Record<string, unknown>
): LogEntry {
  const { category: _category, name: _name, ...scope } = bindings;
  const [first, second, ...rest] = args;
  const base = { category, level, scope, time: Date.now() };

  if (typeof first === 'string') {
    const interpolation = args.slice(1);
    return {
      ...base,
      message: interpolation.length > 0 ? format(first, ...interpolation) : first,
      template: first,
      attributes: {},
    };
  }

  const template = typeof second === 'string' ? second : '';
  const message = rest.length > 0 ? format(template, ...rest) : template;

  if (first instanceof Error) {
    return {
      ...base,
      message: message || first.message,
      template: template || first.message,
      attributes: {},
      error: first,
    };
  }

  if (isRecord(first)) {
    const { err, ...attributes } = first;
    return {
      ...base,
      message,
      template,
      attributes,
      error: err instanceof Error ? err : undefined,
    };
  }

  return { ...base, message, template, attributes: {} };
}
