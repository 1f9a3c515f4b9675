/**
 * Bridges host log entries into the OpenTelemetry logs SDK.
 */

import { SeverityNumber, type AnyValue, type AnyValueMap } from '@opentelemetry/api-logs';
import { z } from 'zod';
import { configBoolean } from '@fnhost/config';
import type { LogEntry, LogLevel, LogSink } from '@fnhost/logging';
import type { OpenTelemetryBuilder } from './builder.js';

export const logPipelineOptionsSchema = z.object({
  includeScopes: configBoolean.default('false'),
  includeFormattedMessage: configBoolean.default('false'),
});

export type LogPipelineOptions = z.output<typeof logPipelineOptionsSchema>;

const SEVERITY: Record<LogLevel, SeverityNumber> = {
  trace: SeverityNumber.TRACE,
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
  fatal: SeverityNumber.FATAL,
};

export class OpenTelemetryLogSink implements LogSink {
  readonly name = 'opentelemetry';

  constructor(
    private readonly builder: OpenTelemetryBuilder,
    private readonly options: LogPipelineOptions = { includeScopes: false, includeFormattedMessage: false }
  ) {}

  emit(entry: LogEntry): void {
    const logger = this.builder.build().loggerProvider.getLogger(entry.category);

    const attributes: AnyValueMap = {};
    if (this.options.includeScopes) {
      copyAttributes(entry.scope, attributes);
    }
    copyAttributes(entry.attributes, attributes);
    if (entry.error) {
      attributes['exception.type'] = entry.error.name;
      attributes['exception.message'] = entry.error.message;
      if (entry.error.stack) {
        attributes['exception.stacktrace'] = entry.error.stack;
      }
    }

    logger.emit({
      timestamp: entry.time,
      severityNumber: SEVERITY[entry.level],
      severityText: entry.level.toUpperCase(),
      body: this.options.includeFormattedMessage ? entry.message : entry.template,
      attributes,
    });
  }

  flush(): Promise<void> {
    return this.builder.forceFlush();
  }
}

function copyAttributes(source: Record<string, unknown>, target: AnyValueMap): void {
  for (const [key, value] of Object.entries(source)) {
    const converted = toAnyValue(value, 0);
    if (converted !== undefined) {
      target[key] = converted;
    }
  }
}

function toAnyValue(value: unknown, depth: number): AnyValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Uint8Array) {
    return value;
  }
  if (depth >= 4) {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => toAnyValue(item, depth + 1) ?? null);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    const map: AnyValueMap = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toAnyValue(item, depth + 1);
      if (converted !== undefined) {
        map[key] = converted;
      }
    }
    return map;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return undefined;
}
