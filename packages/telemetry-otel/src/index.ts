/**
 * @fnhost/telemetry-otel - OpenTelemetry pipeline for the functions host
 *
 * Builds tracer, meter and logger providers from host.json, with URL
 * sanitizing, dependency noise filtering and host enrichment.
 */

export { OpenTelemetryBuilder, type OpenTelemetryProviders } from './builder.js';
export {
  configureOpenTelemetry,
  isOpenTelemetrySdkDisabled,
  type ConfigureOpenTelemetryOptions,
  type OpenTelemetryConfigurationResult,
} from './configure.js';
export {
  registerFileConfiguredExporters,
  defaultExporterFactory,
  otlpExporterOptionsSchema,
  azureMonitorOptionsSchema,
  signalUrl,
  parseOtlpHeaders,
  type TelemetryExporterFactory,
  type ExporterRegistrationContext,
  type OtlpExporterOptions,
  type AzureMonitorOptions,
  type AzureMonitorExporters,
} from './exporters.js';
export { ResourceBuilder, configureResource, type ServiceResourceOptions } from './resource.js';
export {
  addOpenTelemetryConfigurations,
  disabledEntries,
  ENABLED_METRICS_PATH,
  ENABLED_TRACES_PATH,
} from './translation.js';
export { OpenTelemetryLogSink, logPipelineOptionsSchema, type LogPipelineOptions } from './log-sink.js';
export { wireHostInstanceId } from './host-instance-id.js';
export { SpanSanitizingProcessor } from './processors/sanitizing.js';
export { SpanEnrichmentProcessor, LogEnrichmentProcessor } from './processors/enrichment.js';
export {
  DependencyTraceFilterProcessor,
  DependencyFilterState,
  TELEMETRY_INGESTION_HOSTS,
} from './processors/dependency-filter.js';
