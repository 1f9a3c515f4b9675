/**
 * Application Insights pipeline setup
 *
 * Runs only when an instrumentation key or connection string is
 * configured, or while the host is a placeholder (so specialization
 * does not pay for creating the client).
 */

import { z } from 'zod';
import {
  CONFIGURATION_SECTION_NAMES,
  ENVIRONMENT_SETTING_NAMES,
  SCRIPT_CONSTANTS,
} from '@fnhost/kernel';
import { ConfigurationPath, configBoolean } from '@fnhost/config';
import type { LoggingBuilder } from '@fnhost/logging';
import type { HostContext } from '@fnhost/telemetry';
import { defaultClientFactory, type AppInsightsClient, type AppInsightsClientFactory } from './client.js';
import { createScriptTelemetryProcessor, workerTraceFilter } from './processors.js';
import { ApplicationInsightsLogSink } from './sink.js';

export const applicationInsightsLoggerOptionsSchema = z.object({
  enableDependencyTracking: configBoolean.default('true'),
  httpAutoCollectionOptions: z
    .object({
      enableHttpTriggerExtendedInfoCollection: configBoolean.default('true'),
    })
    .default({}),
});

export type ApplicationInsightsLoggerOptions = z.output<typeof applicationInsightsLoggerOptionsSchema>;

export interface ConfigureApplicationInsightsOptions {
  clientFactory?: AppInsightsClientFactory;
  hostInstanceId?: string;
  processId?: number;
  /** Defaults to WEBSITE_PLACEHOLDER_MODE in the context environment */
  placeholderMode?: boolean;
}

export interface ApplicationInsightsConfiguration {
  client: AppInsightsClient;
  loggerOptions: ApplicationInsightsLoggerOptions;
  sink: ApplicationInsightsLogSink;
}

export function isPlaceholderModeEnabled(environment: Record<string, string | undefined>): boolean {
  return environment[ENVIRONMENT_SETTING_NAMES.PLACEHOLDER_MODE] === '1';
}

/**
 * @returns undefined when Application Insights is not configured
 */
export function configureApplicationInsights(
  context: HostContext,
  loggingBuilder: LoggingBuilder,
  options: ConfigureApplicationInsightsOptions = {}
): ApplicationInsightsConfiguration | undefined {
  const { configuration, environment } = context;
  const instrumentationKey = configuration.get(ENVIRONMENT_SETTING_NAMES.APPINSIGHTS_INSTRUMENTATION_KEY);
  const connectionString = configuration.get(ENVIRONMENT_SETTING_NAMES.APPINSIGHTS_CONNECTION_STRING);
  const placeholder = options.placeholderMode ?? isPlaceholderModeEnabled(environment);

  if (!instrumentationKey && !connectionString && !placeholder) {
    return undefined;
  }

  const loggerOptions = configuration
    .getSection(
      ConfigurationPath.combine(
        CONFIGURATION_SECTION_NAMES.JOB_HOST,
        CONFIGURATION_SECTION_NAMES.LOGGING,
        CONFIGURATION_SECTION_NAMES.APPLICATION_INSIGHTS
      )
    )
    .bind(applicationInsightsLoggerOptionsSchema);

  if (placeholder) {
    loggerOptions.enableDependencyTracking = false;
    loggerOptions.httpAutoCollectionOptions.enableHttpTriggerExtendedInfoCollection = false;
  }

  const client = (options.clientFactory ?? defaultClientFactory)({
    instrumentationKey,
    connectionString,
    disabled: !instrumentationKey && !connectionString,
  });

  client.addTelemetryProcessor(workerTraceFilter);
  client.addTelemetryProcessor(
    createScriptTelemetryProcessor({ enableDependencyTracking: loggerOptions.enableDependencyTracking })
  );

  if (options.hostInstanceId) {
    client.commonProperties[SCRIPT_CONSTANTS.LOG_PROPERTY_HOST_INSTANCE_ID] = options.hostInstanceId;
  }
  client.commonProperties[SCRIPT_CONSTANTS.LOG_PROPERTY_PROCESS_ID] = String(options.processId ?? process.pid);

  const sink = new ApplicationInsightsLogSink(client);
  loggingBuilder.addSink(sink);

  return { client, loggerOptions, sink };
}
