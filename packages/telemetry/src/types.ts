/**
 * @fnhost/telemetry - Shared telemetry types
 */

import { HostError, ERROR_CODES } from '@fnhost/kernel';
import type { ConfigurationRoot } from '@fnhost/config';

/**
 * Which telemetry pipeline the host wires up
 */
export type TelemetryMode = 'none' | 'applicationInsights' | 'openTelemetry';

const TELEMETRY_MODES: readonly TelemetryMode[] = ['none', 'applicationInsights', 'openTelemetry'];

const DEFAULT_TELEMETRY_MODE: TelemetryMode = 'applicationInsights';

/**
 * Parse a telemetry mode case-insensitively.
 *
 * @throws HostError E_CONFIG_INVALID for unknown values
 */
export function parseTelemetryMode(value: string | undefined): TelemetryMode {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_TELEMETRY_MODE;
  }
  const lower = value.trim().toLowerCase();
  const mode = TELEMETRY_MODES.find((m) => m.toLowerCase() === lower);
  if (!mode) {
    throw new HostError(
      ERROR_CODES.E_CONFIG_INVALID,
      `Unknown telemetry mode '${value}'. Expected one of: ${TELEMETRY_MODES.join(', ')}`
    );
  }
  return mode;
}

/**
 * Options of the running script host
 */
export interface ScriptJobHostOptions {
  /** Unique id of this host instance */
  instanceId: string;
  rootScriptPath: string;
  telemetryMode: TelemetryMode;
}

/**
 * What telemetry setup sees of the host being built
 */
export interface HostContext {
  configuration: ConfigurationRoot;
  environment: Record<string, string | undefined>;
}

/**
 * Mutable host state consulted by log filters at log time
 */
export class HostRuntimeState {
  /**
   * Set when the language worker sends its own logs to Application
   * Insights; console and function logs are then not forwarded.
   */
  workerApplicationInsightsLoggingEnabled = false;
}
