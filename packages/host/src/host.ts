/**
 * Script host lifecycle
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import { CONFIGURATION_SECTION_NAMES, SCRIPT_CONSTANTS } from '@fnhost/kernel';
import { ConfigurationBuilder, type ConfigurationRoot } from '@fnhost/config';
import type { Logger, LoggerFactory } from '@fnhost/logging';
import { readSecretManagerSettings, type SecretManager } from '@fnhost/secrets';
import { addOpenTelemetryConfigurations } from '@fnhost/telemetry-otel';
import { WorkerConsoleLogService, WorkerConsoleLogSource } from '@fnhost/worker-core';
import { ServiceContainer, createToken } from './container.js';
import { HOST_SERVICES, initializeWebHost, type WebHostOptions } from './bootstrap.js';
import type { ScriptEventManager } from './events.js';
import { ScriptSettingsManager, type WebHostSettings } from './settings.js';
import type { HostTelemetry } from './telemetry-setup.js';

export const HOST_JSON_FILE = 'host.json';

export const CONSOLE_LOG_SERVICES = {
  source: createToken<WorkerConsoleLogSource>('WorkerConsoleLogSource'),
  service: createToken<WorkerConsoleLogService>('WorkerConsoleLogService'),
} as const;

export interface CreateHostOptions {
  /** Function app root containing host.json and one directory per function */
  scriptPath: string;
  environment?: Record<string, string | undefined>;
  secretsPath?: string;
  /** Generated when omitted */
  hostInstanceId?: string;
  consoleLogSource?: WorkerConsoleLogSource;
  /** `registerGlobalProviders` defaults to true here */
  webHost?: WebHostOptions;
}

export interface ScriptHost {
  readonly configuration: ConfigurationRoot;
  readonly settings: WebHostSettings;
  readonly settingsManager: ScriptSettingsManager;
  readonly container: ServiceContainer;
  readonly loggerFactory: LoggerFactory;
  readonly telemetry: HostTelemetry;
  readonly secretManager: SecretManager;
  readonly eventManager: ScriptEventManager;
  readonly consoleLogSource: WorkerConsoleLogSource;
  /** Stop the console log service, flush telemetry and dispose the container */
  stop(): Promise<void>;
}

/**
 * host.json is mounted under `AzureFunctionsJobHost`, environment variables
 * on top. OpenTelemetry sections are then lifted to the root the SDK setup
 * reads from.
 */
export function buildHostConfiguration(
  scriptPath: string,
  environment: Record<string, string | undefined>
): ConfigurationRoot {
  const source = new ConfigurationBuilder()
    .addJsonFile(path.join(scriptPath, HOST_JSON_FILE), { optional: true, prefix: CONFIGURATION_SECTION_NAMES.JOB_HOST })
    .addEnvironmentVariables(environment)
    .build();

  const builder = new ConfigurationBuilder().addConfiguration(source);
  addOpenTelemetryConfigurations(builder, source);
  return builder.build();
}

export function createHost(options: CreateHostOptions): ScriptHost {
  const environment = options.environment ?? process.env;
  const configuration = buildHostConfiguration(options.scriptPath, environment);
  const settingsManager = new ScriptSettingsManager(configuration, environment);

  const settings: WebHostSettings = {
    scriptPath: options.scriptPath,
    secretsPath: options.secretsPath ?? readSecretManagerSettings(environment, options.scriptPath).secretsPath,
    hostInstanceId: options.hostInstanceId ?? randomUUID(),
    telemetryMode: settingsManager.telemetryMode,
  };

  const container = new ServiceContainer();
  // Instrumentations find the host's tracer and meter providers through the API globals
  initializeWebHost(settingsManager, container, settings, { registerGlobalProviders: true, ...options.webHost });

  const consoleLogSource = options.consoleLogSource ?? new WorkerConsoleLogSource();
  container
    .registerInstance(CONSOLE_LOG_SERVICES.source, consoleLogSource)
    .registerSingleton(
      CONSOLE_LOG_SERVICES.service,
      (c) => new WorkerConsoleLogService(c.resolve(CONSOLE_LOG_SERVICES.source), c.resolve(HOST_SERVICES.loggerFactory))
    );

  const telemetry = container.resolve(HOST_SERVICES.hostTelemetry);
  const loggerFactory = container.resolve(HOST_SERVICES.loggerFactory);
  const secretManager = container.resolve(HOST_SERVICES.secretManager);
  const eventManager = container.resolve(HOST_SERVICES.eventManager);
  const consoleLogService = container.resolve(CONSOLE_LOG_SERVICES.service);
  const logger = loggerFactory.createLogger(SCRIPT_CONSTANTS.LOG_CATEGORY_HOST_GENERAL);

  consoleLogService.start();
  eventManager.publish({ source: 'host', name: 'started', data: { hostInstanceId: settings.hostInstanceId } });
  logger.info(
    { hostInstanceId: settings.hostInstanceId, telemetryMode: settings.telemetryMode },
    'Host started'
  );

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    stopping ??= stopHost(container, consoleLogService, eventManager, telemetry, logger);
    return stopping;
  };

  return {
    configuration,
    settings,
    settingsManager,
    container,
    loggerFactory,
    telemetry,
    secretManager,
    eventManager,
    consoleLogSource,
    stop,
  };
}

async function stopHost(
  container: ServiceContainer,
  consoleLogService: WorkerConsoleLogService,
  eventManager: ScriptEventManager,
  telemetry: HostTelemetry,
  logger: Logger
): Promise<void> {
  eventManager.publish({ source: 'host', name: 'stopping' });
  await consoleLogService.stop();
  logger.info('Host stopped');
  await telemetry.flush();
  await container.dispose();
}
