/**
 * @fnhost/telemetry - Attribute and section names
 *
 * Section names follow the host.json layout; attribute names follow the
 * stable OTel semantic conventions where one exists.
 */

/**
 * host.json section names used by the OpenTelemetry pipeline
 */
export const OTEL_SECTION_NAMES = {
  OPEN_TELEMETRY: 'openTelemetry',
  EXPORTERS: 'exporters',
  CONSOLE_EXPORTER: 'console',
  GENEVA_EXPORTER: 'geneva',
  AZURE_MONITOR_EXPORTER: 'azureMonitor',
  METRICS: 'metrics',
  ENABLED_METRICS: 'enabledMetrics',
  FUNCTIONS_RUNTIME_METRICS: 'Functions.Runtime',
  TRACES: 'traces',
  ENABLED_TRACES: 'enabledTraces',
  FUNCTIONS_RUNTIME_INSTRUMENTATION_TRACES: 'FunctionsRuntimeInstrumentation',
  RESOURCES: 'resources',
  RESOURCE_ATTRIBUTES: 'attributes',
} as const;

/**
 * Root sections the translated metrics/traces configuration is lifted to
 */
export const OTEL_ROOT_SECTIONS = {
  METRICS: 'Metrics',
  ENABLED_METRICS: 'EnabledMetrics',
  TRACES: 'Traces',
  ENABLED_TRACES: 'EnabledTraces',
} as const;

/**
 * Exporter keys with built-in handling; any other key is an OTLP exporter
 */
export const WELL_KNOWN_EXPORTERS: readonly string[] = [
  OTEL_SECTION_NAMES.CONSOLE_EXPORTER,
  OTEL_SECTION_NAMES.GENEVA_EXPORTER,
  OTEL_SECTION_NAMES.AZURE_MONITOR_EXPORTER,
];

/**
 * Meter and instrumentation scope of the host's own HTTP pipeline.
 * `Functions.Runtime` / `FunctionsRuntimeInstrumentation` map onto these.
 */
export const HOST_RUNTIME_METER_NAME = '@opentelemetry/instrumentation-http';
export const HOST_RUNTIME_INSTRUMENTATION_SCOPE = '@opentelemetry/instrumentation-http';

/**
 * Span attributes that may carry credentials in a URL
 */
export const URL_ATTRIBUTES = {
  QUERY: 'url.query',
  FULL: 'url.full',
  LEGACY_HTTP_URL: 'http.url',
} as const;

export const SANITIZED_SPAN_ATTRIBUTES: readonly string[] = [
  URL_ATTRIBUTES.QUERY,
  URL_ATTRIBUTES.FULL,
  URL_ATTRIBUTES.LEGACY_HTTP_URL,
];

/**
 * Attributes naming the target of a client span
 */
export const PEER_ATTRIBUTES = {
  SERVER_ADDRESS: 'server.address',
  LEGACY_NET_PEER_NAME: 'net.peer.name',
  LEGACY_HTTP_HOST: 'http.host',
} as const;

/**
 * Resource attributes marking telemetry as produced by the host
 */
export const AI_SDK_PREFIX_ATTRIBUTE = 'ai.sdk.prefix';
