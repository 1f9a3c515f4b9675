import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { InMemoryLogRecordExporter } from '@opentelemetry/sdk-logs';
import { AggregationTemporality, InMemoryMetricExporter } from '@opentelemetry/sdk-metrics';
import { ConfigurationBuilder } from '@fnhost/config';
import type { AzureMonitorOptions, TelemetryExporterFactory } from '@fnhost/telemetry-otel';
import { LoggingBuilder } from '@fnhost/logging';
import type { AppInsightsClient, ExceptionItem, TelemetryProcessor, TraceItem } from '@fnhost/telemetry-appinsights';

export class FakeAppInsightsClient implements AppInsightsClient {
  commonProperties: Record<string, string> = {};
  readonly processors: TelemetryProcessor[] = [];
  readonly traces: TraceItem[] = [];
  readonly exceptions: ExceptionItem[] = [];
  flushed = 0;

  addTelemetryProcessor(processor: TelemetryProcessor): void {
    this.processors.push(processor);
  }

  trackTrace(telemetry: TraceItem): void {
    this.traces.push(telemetry);
  }

  trackException(telemetry: ExceptionItem): void {
    this.exceptions.push(telemetry);
  }

  flush(): void {
    this.flushed++;
  }
}

export function configuration(values: Record<string, string>) {
  return new ConfigurationBuilder().addInMemoryCollection(values).build();
}

/**
 * Logging builders writing pino JSON lines to memory
 */
export function captureLogging() {
  const lines: string[] = [];
  return {
    lines,
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
    createLoggingBuilder: () => new LoggingBuilder().setDestination({ write: (msg: string) => lines.push(msg) }),
  };
}

function memoryExporters() {
  return {
    spans: new InMemorySpanExporter(),
    metrics: new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE),
    logs: new InMemoryLogRecordExporter(),
  };
}

/**
 * Exporter factory recording which exporters configuration asked for
 */
export function memoryExporterFactory() {
  const calls: string[] = [];
  const azureMonitorOptions: AzureMonitorOptions[] = [];
  const azureMonitor = memoryExporters();
  const otlp = memoryExporters();
  const console = memoryExporters();

  const record = <T>(call: string, exporter: T): T => {
    calls.push(call);
    return exporter;
  };

  const factory: TelemetryExporterFactory = {
    createOtlpSpanExporter: (name) => record(`otlp:traces:${name}`, otlp.spans),
    createOtlpMetricExporter: (name) => record(`otlp:metrics:${name}`, otlp.metrics),
    createOtlpLogExporter: (name) => record(`otlp:logs:${name}`, otlp.logs),
    createConsoleSpanExporter: () => record('console:traces', console.spans),
    createConsoleMetricExporter: () => record('console:metrics', console.metrics),
    createConsoleLogExporter: () => record('console:logs', console.logs),
    createAzureMonitorExporters: (options) => {
      azureMonitorOptions.push(options);
      return record('azureMonitor', azureMonitor);
    },
  };

  return { factory, calls, azureMonitorOptions, azureMonitor, otlp, console };
}
