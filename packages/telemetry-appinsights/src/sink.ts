import { Contracts } from 'applicationinsights';
import { sanitize } from '@fnhost/privacy';
import type { LogEntry, LogLevel, LogSink } from '@fnhost/logging';
import type { AppInsightsClient, SeverityLevel } from './client.js';

const SEVERITY: Record<LogLevel, SeverityLevel> = {
  trace: Contracts.SeverityLevel.Verbose,
  debug: Contracts.SeverityLevel.Verbose,
  info: Contracts.SeverityLevel.Information,
  warn: Contracts.SeverityLevel.Warning,
  error: Contracts.SeverityLevel.Error,
  fatal: Contracts.SeverityLevel.Critical,
};

/**
 * Sends host log entries as trace (or exception) telemetry.
 */
export class ApplicationInsightsLogSink implements LogSink {
  readonly name = 'applicationinsights';

  constructor(private readonly client: AppInsightsClient) {}

  emit(entry: LogEntry): void {
    const properties = toProperties(entry);
    const severity = SEVERITY[entry.level];

    if (entry.error) {
      this.client.trackException({ exception: entry.error, severity, properties });
      return;
    }
    this.client.trackTrace({ message: sanitize(entry.message), severity, properties });
  }

  async flush(): Promise<void> {
    this.client.flush();
  }
}

function toProperties(entry: LogEntry): Record<string, string> {
  const properties: Record<string, string> = {
    Category: entry.category,
    LogLevel: entry.level,
  };
  for (const [key, value] of Object.entries({ ...entry.scope, ...entry.attributes })) {
    if (value === undefined) {
      continue;
    }
    properties[key] = sanitize(typeof value === 'string' ? value : JSON.stringify(value));
  }
  if (entry.error) {
    properties['FormattedMessage'] = sanitize(entry.message);
  }
  return properties;
}
