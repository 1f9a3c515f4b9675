/**
 * Web host resolver
 *
 * Owns the services that depend on the current web host settings: the
 * logger factory, the secret manager and the telemetry pipeline. They are
 * created on first use and replaced when asked for with different
 * settings; the resolver disposes them.
 */

import { HostError, ERROR_CODES, SCRIPT_CONSTANTS, type Disposable } from '@fnhost/kernel';
import { LoggingBuilder, type LoggerFactory } from '@fnhost/logging';
import { readSecretManagerSettings, type SecretManager, type SecretManagerFactory } from '@fnhost/secrets';
import { HostRuntimeState } from '@fnhost/telemetry';
import type { ScriptEventManager } from './events.js';
import type { ScriptSettingsManager, WebHostSettings } from './settings.js';
import { HostTelemetrySetup, type HostTelemetry, type HostTelemetryOptions } from './telemetry-setup.js';

export interface WebHostResolverOptions extends HostTelemetryOptions {
  /** Fresh builder per settings; tests use it to capture output */
  createLoggingBuilder?: () => LoggingBuilder;
}

interface ActiveServices {
  settings: WebHostSettings;
  loggingBuilder: LoggingBuilder;
  telemetry?: HostTelemetry;
  loggerFactory?: LoggerFactory;
  secretManager?: SecretManager;
}

export class WebHostResolver implements Disposable {
  readonly runtimeState = new HostRuntimeState();
  private active?: ActiveServices;
  private disposed = false;

  constructor(
    private readonly settingsManager: ScriptSettingsManager,
    private readonly secretManagerFactory: SecretManagerFactory,
    private readonly eventManager: ScriptEventManager,
    private readonly options: WebHostResolverOptions = {}
  ) {}

  getHostTelemetry(settings: WebHostSettings): HostTelemetry {
    const active = this.activate(settings);
    if (!active.telemetry) {
      const setup = new HostTelemetrySetup(
        { configuration: this.settingsManager.configuration, environment: this.settingsManager.environmentVariables },
        active.loggingBuilder,
        this.runtimeState,
        { ...this.options, placeholderMode: this.settingsManager.isPlaceholderMode }
      );
      active.telemetry = setup.postConfigure({
        instanceId: settings.hostInstanceId,
        rootScriptPath: settings.scriptPath,
        telemetryMode: settings.telemetryMode,
      });
    }
    return active.telemetry;
  }

  /**
   * Telemetry contributes to logging, so it is set up first.
   */
  getLoggerFactory(settings: WebHostSettings): LoggerFactory {
    this.getHostTelemetry(settings);
    const active = this.activate(settings);
    active.loggerFactory ??= active.loggingBuilder.build();
    return active.loggerFactory;
  }

  getSecretManager(settings: WebHostSettings): SecretManager {
    const loggerFactory = this.getLoggerFactory(settings);
    const active = this.activate(settings);
    if (!active.secretManager) {
      const secretSettings = {
        ...readSecretManagerSettings(this.settingsManager.environmentVariables, settings.scriptPath),
        secretsPath: settings.secretsPath,
        hostName: this.settingsManager.hostName,
      };
      active.secretManager = this.secretManagerFactory.create(secretSettings, loggerFactory);
      loggerFactory
        .createLogger(SCRIPT_CONSTANTS.LOG_CATEGORY_HOST_GENERAL)
        .debug({ storageType: secretSettings.storageType }, 'Secret manager created');
    }
    return active.secretManager;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    const active = this.active;
    this.active = undefined;
    if (active) {
      await disposeServices(active);
    }
  }

  private activate(settings: WebHostSettings): ActiveServices {
    if (this.disposed) {
      throw new HostError(ERROR_CODES.E_DISPOSED, 'The web host resolver has been disposed');
    }
    if (this.active?.settings === settings) {
      return this.active;
    }

    const previous = this.active;
    this.active = {
      settings,
      loggingBuilder: this.options.createLoggingBuilder?.() ?? new LoggingBuilder(),
    };
    if (previous) {
      this.eventManager.publish({ source: 'webhost', name: 'settingsChanged' });
      disposeServices(previous).catch((err: unknown) => {
        previous.loggerFactory
          ?.createLogger(SCRIPT_CONSTANTS.LOG_CATEGORY_HOST_GENERAL)
          .error({ err }, 'Failed to dispose services for previous settings');
      });
    }
    return this.active;
  }
}

async function disposeServices(services: ActiveServices): Promise<void> {
  await services.secretManager?.dispose();
  await services.loggerFactory?.flush();
  await services.telemetry?.dispose();
}
