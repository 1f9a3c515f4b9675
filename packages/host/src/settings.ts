/**
 * Script settings
 */

import { CONFIGURATION_SECTION_NAMES, ENVIRONMENT_SETTING_NAMES } from '@fnhost/kernel';
import { ConfigurationBuilder, ConfigurationPath, type ConfigurationRoot } from '@fnhost/config';
import { parseTelemetryMode, type TelemetryMode } from '@fnhost/telemetry';

/**
 * Settings the web host is created for. A resolver keeps one set of
 * services per settings object.
 */
export interface WebHostSettings {
  scriptPath: string;
  secretsPath: string;
  hostInstanceId: string;
  telemetryMode: TelemetryMode;
}

/**
 * Reads host settings from configuration, falling back to the process
 * environment.
 */
export class ScriptSettingsManager {
  private readonly environment: Record<string, string | undefined>;

  constructor(
    readonly configuration: ConfigurationRoot = new ConfigurationBuilder().build(),
    environment: Record<string, string | undefined> = process.env
  ) {
    this.environment = { ...environment };
  }

  /**
   * Blank values read as unset.
   */
  getSetting(name: string): string | undefined {
    const value = this.configuration.get(name) ?? this.environment[name];
    return value === undefined || value.trim() === '' ? undefined : value;
  }

  /** Snapshot of the environment the settings fall back to */
  get environmentVariables(): Record<string, string | undefined> {
    return { ...this.environment };
  }

  get isPlaceholderMode(): boolean {
    return this.getSetting(ENVIRONMENT_SETTING_NAMES.PLACEHOLDER_MODE) === '1';
  }

  get hostName(): string | undefined {
    return this.getSetting(ENVIRONMENT_SETTING_NAMES.WEBSITE_HOSTNAME)?.toLowerCase();
  }

  /**
   * `AzureFunctionsJobHost:telemetryMode` from host.json.
   *
   * @throws HostError E_CONFIG_INVALID for an unknown mode
   */
  get telemetryMode(): TelemetryMode {
    return parseTelemetryMode(
      this.configuration.get(
        ConfigurationPath.combine(CONFIGURATION_SECTION_NAMES.JOB_HOST, CONFIGURATION_SECTION_NAMES.TELEMETRY_MODE)
      )
    );
  }
}
