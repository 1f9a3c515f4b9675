/**
 * @fnhost/telemetry-appinsights - Application Insights pipeline for the functions host
 */

export {
  configureApplicationInsights,
  isPlaceholderModeEnabled,
  applicationInsightsLoggerOptionsSchema,
  type ApplicationInsightsConfiguration,
  type ApplicationInsightsLoggerOptions,
  type ConfigureApplicationInsightsOptions,
} from './configure.js';
export {
  defaultClientFactory,
  type AppInsightsClient,
  type AppInsightsClientFactory,
  type ClientSettings,
  type ExceptionItem,
  type SeverityLevel,
  type TraceItem,
} from './client.js';
export {
  workerTraceFilter,
  createScriptTelemetryProcessor,
  ENVELOPE_BASE_TYPES,
  type TelemetryEnvelope,
  type TelemetryProcessor,
  type ScriptTelemetryProcessorOptions,
} from './processors.js';
export { ApplicationInsightsLogSink } from './sink.js';
