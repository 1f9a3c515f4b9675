/**
 * host.json keeps metrics/traces SDK settings under
 * `AzureFunctionsJobHost:{metrics,traces}:openTelemetry`. The pipeline
 * reads them from the root `Metrics` / `Traces` sections, so they are
 * renamed and lifted there.
 */

import { CONFIGURATION_SECTION_NAMES } from '@fnhost/kernel';
import {
  ConfigurationPath,
  tryParseBool,
  type ConfigurationBuilder,
  type ConfigurationRoot,
  type ConfigurationSection,
} from '@fnhost/config';
import {
  HOST_RUNTIME_INSTRUMENTATION_SCOPE,
  HOST_RUNTIME_METER_NAME,
  OTEL_ROOT_SECTIONS,
  OTEL_SECTION_NAMES,
} from '@fnhost/telemetry';

export function addOpenTelemetryConfigurations(builder: ConfigurationBuilder, configuration: ConfigurationRoot): void {
  const metrics = configuration.getSection(
    ConfigurationPath.combine(CONFIGURATION_SECTION_NAMES.JOB_HOST, OTEL_SECTION_NAMES.METRICS, OTEL_SECTION_NAMES.OPEN_TELEMETRY)
  );
  if (metrics.exists()) {
    renameEntry(metrics, OTEL_SECTION_NAMES.ENABLED_METRICS, OTEL_SECTION_NAMES.FUNCTIONS_RUNTIME_METRICS, HOST_RUNTIME_METER_NAME);
    builder.addInMemoryCollection(liftSection(metrics, OTEL_ROOT_SECTIONS.METRICS));
  }

  const traces = configuration.getSection(
    ConfigurationPath.combine(CONFIGURATION_SECTION_NAMES.JOB_HOST, OTEL_SECTION_NAMES.TRACES, OTEL_SECTION_NAMES.OPEN_TELEMETRY)
  );
  if (traces.exists()) {
    renameEntry(
      traces,
      OTEL_SECTION_NAMES.ENABLED_TRACES,
      OTEL_SECTION_NAMES.FUNCTIONS_RUNTIME_INSTRUMENTATION_TRACES,
      HOST_RUNTIME_INSTRUMENTATION_SCOPE
    );
    builder.addInMemoryCollection(liftSection(traces, OTEL_ROOT_SECTIONS.TRACES));
  }
}

function renameEntry(section: ConfigurationSection, listName: string, from: string, to: string): void {
  const list = section.getSection(listName);
  if (!list.exists()) {
    return;
  }
  const entry = list.getSection(from);
  if (entry.exists()) {
    list.set(to, entry.value);
    entry.value = undefined;
  }
}

/**
 * Copy every leaf of `section` under `target`.
 */
function liftSection(section: ConfigurationSection, target: string): Record<string, string> {
  const values: Record<string, string> = {};
  const visit = (current: ConfigurationSection): void => {
    const value = current.value;
    if (value !== undefined && current !== section) {
      values[ConfigurationPath.combine(target, current.path.slice(section.path.length + 1))] = value;
    }
    for (const child of current.getChildren()) {
      visit(child);
    }
  };
  visit(section);
  return values;
}

/**
 * Names of entries under `configuration[sectionPath]` whose value is `false`.
 */
export function disabledEntries(configuration: ConfigurationRoot, sectionPath: string): string[] {
  return configuration
    .getSection(sectionPath)
    .getChildren()
    .filter((child) => tryParseBool(child.value) === false)
    .map((child) => child.key);
}

export const ENABLED_METRICS_PATH = ConfigurationPath.combine(OTEL_ROOT_SECTIONS.METRICS, OTEL_ROOT_SECTIONS.ENABLED_METRICS);
export const ENABLED_TRACES_PATH = ConfigurationPath.combine(OTEL_ROOT_SECTIONS.TRACES, OTEL_ROOT_SECTIONS.ENABLED_TRACES);
