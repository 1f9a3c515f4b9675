import { SCRIPT_CONSTANTS } from '@fnhost/kernel';
import type { ScriptJobHostOptions } from '@fnhost/telemetry';
import type { OpenTelemetryBuilder } from './builder.js';

/**
 * Adds the host instance id to the shared resource in OpenTelemetry mode.
 */
export function wireHostInstanceId(builder: OpenTelemetryBuilder, options: ScriptJobHostOptions): boolean {
  if (options.telemetryMode !== 'openTelemetry') {
    return false;
  }
  const instanceId = options.instanceId;
  if (!instanceId || instanceId.trim() === '') {
    return false;
  }
  builder.configureResource((resource) =>
    resource.addAttributes({ [SCRIPT_CONSTANTS.LOG_PROPERTY_HOST_INSTANCE_ID]: instanceId })
  );
  return true;
}
