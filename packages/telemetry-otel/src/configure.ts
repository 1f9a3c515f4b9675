/**
 * OpenTelemetry pipeline setup from host.json
 *
 * Configuration lives under `AzureFunctionsJobHost`:
 *
 * ```json
 * {
 *   "openTelemetry": { "exporters": { "collector": { "endpoint": "http://collector:4318" } } },
 *   "logging": { "openTelemetry": { "includeScopes": true, "exporters": { "console": {} } } },
 *   "metrics": { "openTelemetry": { "exporters": {}, "enabledMetrics": { "Functions.Runtime": false } } },
 *   "traces": { "openTelemetry": { "exporters": {} } }
 * }
 * ```
 */

import { AggregationType } from '@opentelemetry/sdk-metrics';
import {
  CONFIGURATION_SECTION_NAMES,
  ENVIRONMENT_SETTING_NAMES,
  SCRIPT_CONSTANTS,
} from '@fnhost/kernel';
import { ConfigurationPath, tryParseBool } from '@fnhost/config';
import { createNullLogger, type Logger, type LoggingBuilder } from '@fnhost/logging';
import {
  ExporterType,
  OTEL_SECTION_NAMES,
  type HostContext,
  type HostRuntimeState,
  type ScriptJobHostOptions,
} from '@fnhost/telemetry';
import { OpenTelemetryBuilder } from './builder.js';
import {
  defaultExporterFactory,
  registerFileConfiguredExporters,
  type ExporterRegistrationContext,
  type TelemetryExporterFactory,
} from './exporters.js';
import { OpenTelemetryLogSink, logPipelineOptionsSchema, type LogPipelineOptions } from './log-sink.js';
import { SpanSanitizingProcessor } from './processors/sanitizing.js';
import { LogEnrichmentProcessor, SpanEnrichmentProcessor } from './processors/enrichment.js';
import { DependencyFilterState } from './processors/dependency-filter.js';
import { configureResource } from './resource.js';
import { disabledEntries, ENABLED_METRICS_PATH, ENABLED_TRACES_PATH } from './translation.js';

export interface ConfigureOpenTelemetryOptions {
  hostOptions?: ScriptJobHostOptions;
  exporterFactory?: TelemetryExporterFactory;
  /** Builder to add to; a new one is created when omitted */
  builder?: OpenTelemetryBuilder;
  logger?: Logger;
}

export interface OpenTelemetryConfigurationResult {
  appInsightsConfigured: boolean;
  /** Undefined when the SDK is disabled */
  builder?: OpenTelemetryBuilder;
  dependencyFilter?: DependencyFilterState;
}

/**
 * The SDK stays off unless OTEL_SDK_DISABLED is set to something other than `true`.
 */
export function isOpenTelemetrySdkDisabled(environment: Record<string, string | undefined>): boolean {
  return tryParseBool(environment[ENVIRONMENT_SETTING_NAMES.OTEL_SDK_DISABLED] ?? 'true') === true;
}

export function configureOpenTelemetry(
  loggingBuilder: LoggingBuilder,
  context: HostContext,
  state: HostRuntimeState,
  options: ConfigureOpenTelemetryOptions = {}
): OpenTelemetryConfigurationResult {
  if (isOpenTelemetrySdkDisabled(context.environment)) {
    return { appInsightsConfigured: false };
  }

  const { configuration } = context;
  const logger = options.logger ?? createNullLogger();
  const builder = options.builder ?? new OpenTelemetryBuilder();
  const dependencyFilter = new DependencyFilterState();
  const hostInstanceId = options.hostOptions?.instanceId;

  // Span and log processors run in registration order; these precede every exporter
  builder
    .addSpanProcessor(SpanSanitizingProcessor.instance)
    .addSpanProcessor(new SpanEnrichmentProcessor(hostInstanceId))
    .addLogRecordProcessor(new LogEnrichmentProcessor(hostInstanceId));

  const loggingSection = configuration.getSection(
    ConfigurationPath.combine(CONFIGURATION_SECTION_NAMES.JOB_HOST, CONFIGURATION_SECTION_NAMES.LOGGING, OTEL_SECTION_NAMES.OPEN_TELEMETRY)
  );
  const logOptions: LogPipelineOptions | undefined = loggingSection.exists()
    ? loggingSection.bind(logPipelineOptionsSchema)
    : undefined;

  // Worker console and function logs are the worker's to send when it has Application Insights enabled
  loggingBuilder
    .addFilter(SCRIPT_CONSTANTS.CONSOLE_LOG_CATEGORY, () => !state.workerApplicationInsightsLoggingEnabled)
    .addFilter(`${SCRIPT_CONSTANTS.FUNCTION_LOG_CATEGORY_PREFIX}.*`, () => !state.workerApplicationInsightsLoggingEnabled);

  const registration: ExporterRegistrationContext = {
    builder,
    factory: options.exporterFactory ?? defaultExporterFactory,
    dependencyFilter,
    logger,
    defaultConnectionString: configuration.get(ENVIRONMENT_SETTING_NAMES.APPINSIGHTS_CONNECTION_STRING),
    azureMonitorRegistered: false,
  };

  const exportersOf = (...path: string[]) =>
    configuration.getSection(ConfigurationPath.combine(CONFIGURATION_SECTION_NAMES.JOB_HOST, ...path, OTEL_SECTION_NAMES.EXPORTERS)).getChildren();

  let appInsightsConfigured = registerFileConfiguredExporters(
    registration,
    exportersOf(OTEL_SECTION_NAMES.OPEN_TELEMETRY),
    ExporterType.All
  );

  // Signal-specific exporters are applied after the global ones
  if (
    registerFileConfiguredExporters(
      registration,
      exportersOf(CONFIGURATION_SECTION_NAMES.LOGGING, OTEL_SECTION_NAMES.OPEN_TELEMETRY),
      ExporterType.Logging
    )
  ) {
    appInsightsConfigured = true;
  }
  registerFileConfiguredExporters(
    registration,
    exportersOf(OTEL_SECTION_NAMES.METRICS, OTEL_SECTION_NAMES.OPEN_TELEMETRY),
    ExporterType.Metrics
  );
  registerFileConfiguredExporters(
    registration,
    exportersOf(OTEL_SECTION_NAMES.TRACES, OTEL_SECTION_NAMES.OPEN_TELEMETRY),
    ExporterType.Traces
  );

  for (const meterName of disabledEntries(configuration, ENABLED_METRICS_PATH)) {
    builder.addView({ meterName, instrumentName: '*', aggregation: { type: AggregationType.DROP } });
  }
  for (const scopeName of disabledEntries(configuration, ENABLED_TRACES_PATH)) {
    dependencyFilter.disableScope(scopeName);
  }

  builder.configureResource((resource) => configureResource(configuration, resource));

  loggingBuilder.addSink(new OpenTelemetryLogSink(builder, logOptions));

  return { appInsightsConfigured, builder, dependencyFilter };
}
