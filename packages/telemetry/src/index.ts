/**
 * @fnhost/telemetry - Shared telemetry types and names
 *
 * Runtime-portable pieces used by both the OpenTelemetry and the
 * Application Insights pipelines.
 */

export {
  HostRuntimeState,
  parseTelemetryMode,
  type TelemetryMode,
  type ScriptJobHostOptions,
  type HostContext,
} from './types.js';

export {
  ExporterType,
  runMatch,
  hasFlag,
  isCompositeFlag,
  type ExporterFlags,
  type FlagAction,
} from './exporter-type.js';

export {
  OTEL_SECTION_NAMES,
  OTEL_ROOT_SECTIONS,
  WELL_KNOWN_EXPORTERS,
  HOST_RUNTIME_METER_NAME,
  HOST_RUNTIME_INSTRUMENTATION_SCOPE,
  URL_ATTRIBUTES,
  SANITIZED_SPAN_ATTRIBUTES,
  PEER_ATTRIBUTES,
  AI_SDK_PREFIX_ATTRIBUTE,
} from './attributes.js';
