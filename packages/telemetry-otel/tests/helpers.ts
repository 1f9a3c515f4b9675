import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { InMemoryLogRecordExporter } from '@opentelemetry/sdk-logs';
import { AggregationTemporality, InMemoryMetricExporter } from '@opentelemetry/sdk-metrics';
import { ConfigurationBuilder } from '@fnhost/config';
import type { HostContext } from '@fnhost/telemetry';
import type { AzureMonitorOptions, OtlpExporterOptions, TelemetryExporterFactory } from '../src/index.js';

export function memoryExporterFactory() {
  const spans = new InMemorySpanExporter();
  const logs = new InMemoryLogRecordExporter();
  const metrics = new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE);
  const calls: string[] = [];
  const otlpOptions: OtlpExporterOptions[] = [];
  const azureMonitorOptions: AzureMonitorOptions[] = [];

  const factory: TelemetryExporterFactory = {
    createOtlpSpanExporter: (name, options) => {
      calls.push(`otlp:traces:${name}`);
      otlpOptions.push(options);
      return spans;
    },
    createOtlpMetricExporter: (name) => {
      calls.push(`otlp:metrics:${name}`);
      return metrics;
    },
    createOtlpLogExporter: (name) => {
      calls.push(`otlp:logs:${name}`);
      return logs;
    },
    createConsoleSpanExporter: () => {
      calls.push('console:traces');
      return spans;
    },
    createConsoleMetricExporter: () => {
      calls.push('console:metrics');
      return metrics;
    },
    createConsoleLogExporter: () => {
      calls.push('console:logs');
      return logs;
    },
    createAzureMonitorExporters: (options) => {
      calls.push('azureMonitor');
      azureMonitorOptions.push(options);
      return { spans, metrics, logs };
    },
  };

  return { factory, spans, logs, metrics, calls, otlpOptions, azureMonitorOptions };
}

export function hostContext(
  values: Record<string, string>,
  environment: Record<string, string | undefined> = { OTEL_SDK_DISABLED: 'false' }
): HostContext {
  return {
    configuration: new ConfigurationBuilder().addInMemoryCollection(values).build(),
    environment,
  };
}

export function captureDestination() {
  const lines: string[] = [];
  return {
    lines,
    messages: () => lines.map((line): unknown => JSON.parse(line).msg),
    write(msg: string) {
      lines.push(msg);
    },
  };
}
