/**
 * File-configured exporters
 *
 * Turns the children of an `exporters` section into exporters for the
 * requested signals. Unknown keys are OTLP/HTTP exporters; `console`,
 * `azureMonitor` and `geneva` have built-in handling.
 */

import { z } from 'zod';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import {
  ConsoleMetricExporter,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from '@opentelemetry/sdk-metrics';
import {
  BatchLogRecordProcessor,
  ConsoleLogRecordExporter,
  SimpleLogRecordProcessor,
  type LogRecordExporter,
  type LogRecordProcessor,
} from '@opentelemetry/sdk-logs';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import {
  AzureMonitorLogExporter,
  AzureMonitorMetricExporter,
  AzureMonitorTraceExporter,
} from '@azure/monitor-opentelemetry-exporter';
import { configBoolean, configInteger, type ConfigurationSection } from '@fnhost/config';
import type { Logger } from '@fnhost/logging';
import {
  ExporterType,
  OTEL_SECTION_NAMES,
  WELL_KNOWN_EXPORTERS,
  hasFlag,
  runMatch,
  type ExporterFlags,
} from '@fnhost/telemetry';
import type { OpenTelemetryBuilder } from './builder.js';
import { DependencyTraceFilterProcessor, type DependencyFilterState } from './processors/dependency-filter.js';

const exportProcessorType = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['batch', 'simple']));

export const otlpExporterOptionsSchema = z.object({
  endpoint: z.string().url().optional(),
  /** `key=value` pairs separated by commas */
  headers: z.string().optional(),
  timeoutMilliseconds: configInteger.optional(),
  exportProcessorType: exportProcessorType.default('batch'),
  exportIntervalMilliseconds: configInteger.optional(),
});

export type OtlpExporterOptions = z.output<typeof otlpExporterOptionsSchema>;

export const azureMonitorOptionsSchema = z.object({
  connectionString: z.string().optional(),
  disableOfflineStorage: configBoolean.optional(),
  storageDirectory: z.string().optional(),
  exportIntervalMilliseconds: configInteger.optional(),
});

export type AzureMonitorOptions = z.output<typeof azureMonitorOptionsSchema>;

export interface AzureMonitorExporters {
  spans: SpanExporter;
  metrics: PushMetricExporter;
  logs: LogRecordExporter;
}

/**
 * Creates the SDK exporters; replaced in tests with in-memory exporters.
 */
export interface TelemetryExporterFactory {
  createOtlpSpanExporter(name: string, options: OtlpExporterOptions): SpanExporter;
  createOtlpMetricExporter(name: string, options: OtlpExporterOptions): PushMetricExporter;
  createOtlpLogExporter(name: string, options: OtlpExporterOptions): LogRecordExporter;
  createConsoleSpanExporter(): SpanExporter;
  createConsoleMetricExporter(): PushMetricExporter;
  createConsoleLogExporter(): LogRecordExporter;
  createAzureMonitorExporters(options: AzureMonitorOptions): AzureMonitorExporters;
}

const OTLP_SIGNAL_PATHS = {
  traces: 'v1/traces',
  metrics: 'v1/metrics',
  logs: 'v1/logs',
} as const;

/**
 * A base endpoint (no path) gets the signal path appended; an endpoint
 * with a path is used as is.
 */
export function signalUrl(endpoint: string | undefined, signal: keyof typeof OTLP_SIGNAL_PATHS): string | undefined {
  if (!endpoint) {
    return undefined;
  }
  const url = new URL(endpoint);
  if (url.pathname === '' || url.pathname === '/') {
    return `${url.origin}/${OTLP_SIGNAL_PATHS[signal]}`;
  }
  return endpoint;
}

/**
 * Parse `k1=v1,k2=v2`
 */
export function parseOtlpHeaders(headers: string | undefined): Record<string, string> | undefined {
  if (!headers) {
    return undefined;
  }
  const parsed: Record<string, string> = {};
  for (const pair of headers.split(',')) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      continue;
    }
    parsed[pair.slice(0, index).trim()] = pair.slice(index + 1).trim();
  }
  return parsed;
}

function otlpConfig(options: OtlpExporterOptions, signal: keyof typeof OTLP_SIGNAL_PATHS) {
  return {
    url: signalUrl(options.endpoint, signal),
    headers: parseOtlpHeaders(options.headers),
    timeoutMillis: options.timeoutMilliseconds,
  };
}

export const defaultExporterFactory: TelemetryExporterFactory = {
  createOtlpSpanExporter: (_name, options) => new OTLPTraceExporter(otlpConfig(options, 'traces')),
  createOtlpMetricExporter: (_name, options) => new OTLPMetricExporter(otlpConfig(options, 'metrics')),
  createOtlpLogExporter: (_name, options) => new OTLPLogExporter(otlpConfig(options, 'logs')),
  createConsoleSpanExporter: () => new ConsoleSpanExporter(),
  createConsoleMetricExporter: () => new ConsoleMetricExporter(),
  createConsoleLogExporter: () => new ConsoleLogRecordExporter(),
  createAzureMonitorExporters: (options) => {
    const exporterOptions = {
      connectionString: options.connectionString,
      disableOfflineStorage: options.disableOfflineStorage,
      storageDirectory: options.storageDirectory,
    };
    return {
      spans: new AzureMonitorTraceExporter(exporterOptions),
      metrics: new AzureMonitorMetricExporter(exporterOptions),
      logs: new AzureMonitorLogExporter(exporterOptions),
    };
  },
};

export interface ExporterRegistrationContext {
  builder: OpenTelemetryBuilder;
  factory: TelemetryExporterFactory;
  dependencyFilter: DependencyFilterState;
  logger: Logger;
  /** Fallback for azureMonitor sections without a connectionString */
  defaultConnectionString?: string;
  /** Set once Azure Monitor exporters have been added */
  azureMonitorRegistered: boolean;
}

/**
 * Register every exporter under `sections` for the signals in `type`.
 *
 * @returns true when an Azure Monitor exporter section was honored
 */
export function registerFileConfiguredExporters(
  context: ExporterRegistrationContext,
  sections: readonly ConfigurationSection[],
  type: ExporterFlags
): boolean {
  let appInsightsConfigured = false;

  for (const section of sections) {
    const key = section.key.toLowerCase();

    if (!WELL_KNOWN_EXPORTERS.some((name) => name.toLowerCase() === key)) {
      registerOtlpExporter(context, section, type);
      continue;
    }

    if (key === OTEL_SECTION_NAMES.AZURE_MONITOR_EXPORTER.toLowerCase()) {
      if (!hasFlag(type, ExporterType.Logging)) {
        // Only one Azure Monitor definition is supported; the logging level owns it
        context.logger.debug({ exporter: section.path }, 'Ignoring azureMonitor exporter outside logging configuration');
        continue;
      }
      appInsightsConfigured = true;
      registerAzureMonitor(context, section);
    } else if (key === OTEL_SECTION_NAMES.GENEVA_EXPORTER.toLowerCase()) {
      context.logger.warn({ exporter: section.path }, 'Geneva exporter is not supported on this runtime; ignoring');
    } else {
      registerConsoleExporter(context, type);
    }
  }

  return appInsightsConfigured;
}

function registerOtlpExporter(context: ExporterRegistrationContext, section: ConfigurationSection, type: ExporterFlags): void {
  const options = section.bind(otlpExporterOptionsSchema);
  const { builder, factory } = context;

  if (options.endpoint) {
    context.dependencyFilter.addEndpoint(options.endpoint);
  }

  runMatch(
    type,
    [
      ExporterType.Logging,
      () =>
        builder.addLogRecordProcessor(
          logProcessor(factory.createOtlpLogExporter(section.key, options), options.exportProcessorType)
        ),
    ],
    [
      ExporterType.Metrics,
      () =>
        builder.addMetricReader(
          new PeriodicExportingMetricReader({
            exporter: factory.createOtlpMetricExporter(section.key, options),
            exportIntervalMillis: options.exportIntervalMilliseconds,
          })
        ),
    ],
    [
      ExporterType.Traces,
      () =>
        builder.addSpanProcessor(
          filtered(context, spanProcessor(factory.createOtlpSpanExporter(section.key, options), options.exportProcessorType))
        ),
    ]
  );
}

function registerConsoleExporter(context: ExporterRegistrationContext, type: ExporterFlags): void {
  const { builder, factory } = context;
  runMatch(
    type,
    [ExporterType.Logging, () => builder.addLogRecordProcessor(new SimpleLogRecordProcessor(factory.createConsoleLogExporter()))],
    [
      ExporterType.Metrics,
      () => builder.addMetricReader(new PeriodicExportingMetricReader({ exporter: factory.createConsoleMetricExporter() })),
    ],
    [ExporterType.Traces, () => builder.addSpanProcessor(filtered(context, new SimpleSpanProcessor(factory.createConsoleSpanExporter())))]
  );
}

function registerAzureMonitor(context: ExporterRegistrationContext, section: ConfigurationSection): void {
  if (context.azureMonitorRegistered) {
    context.logger.warn({ exporter: section.path }, 'Azure Monitor exporter is already configured; ignoring');
    return;
  }

  const options = section.bind(azureMonitorOptionsSchema);
  const exporters = context.factory.createAzureMonitorExporters({
    ...options,
    connectionString: options.connectionString ?? context.defaultConnectionString,
  });

  context.builder
    .addSpanProcessor(filtered(context, new BatchSpanProcessor(exporters.spans)))
    .addMetricReader(
      new PeriodicExportingMetricReader({
        exporter: exporters.metrics,
        exportIntervalMillis: options.exportIntervalMilliseconds,
      })
    )
    .addLogRecordProcessor(new BatchLogRecordProcessor(exporters.logs));
  context.azureMonitorRegistered = true;
}

function filtered(context: ExporterRegistrationContext, processor: SpanProcessor): SpanProcessor {
  return new DependencyTraceFilterProcessor(processor, context.dependencyFilter);
}

function spanProcessor(exporter: SpanExporter, type: 'batch' | 'simple'): SpanProcessor {
  return type === 'simple' ? new SimpleSpanProcessor(exporter) : new BatchSpanProcessor(exporter);
}

function logProcessor(exporter: LogRecordExporter, type: 'batch' | 'simple'): LogRecordProcessor {
  return type === 'simple' ? new SimpleLogRecordProcessor(exporter) : new BatchLogRecordProcessor(exporter);
}
