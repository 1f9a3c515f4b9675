/**
 * Host telemetry setup
 *
 * Picks the telemetry pipeline from the host's telemetry mode once the job
 * host options are known, and contributes its filters and sinks to the
 * logging builder before the logger factory is built.
 */

import type { Disposable } from '@fnhost/kernel';
import { createNullLogger, type Logger, type LoggingBuilder } from '@fnhost/logging';
import type { HostContext, HostRuntimeState, ScriptJobHostOptions, TelemetryMode } from '@fnhost/telemetry';
import {
  OpenTelemetryBuilder,
  configureOpenTelemetry,
  wireHostInstanceId,
  type OpenTelemetryConfigurationResult,
  type TelemetryExporterFactory,
} from '@fnhost/telemetry-otel';
import {
  configureApplicationInsights,
  type AppInsightsClientFactory,
  type ApplicationInsightsConfiguration,
} from '@fnhost/telemetry-appinsights';

export interface HostTelemetryOptions {
  exporterFactory?: TelemetryExporterFactory;
  clientFactory?: AppInsightsClientFactory;
  /** Install the OpenTelemetry providers as process globals */
  registerGlobalProviders?: boolean;
  /** Read from the environment when unset */
  placeholderMode?: boolean;
  logger?: Logger;
}

/**
 * What the host's telemetry pipeline ended up being
 */
export class HostTelemetry implements Disposable {
  private disposed = false;

  constructor(
    readonly mode: TelemetryMode,
    readonly openTelemetry?: OpenTelemetryConfigurationResult,
    readonly applicationInsights?: ApplicationInsightsConfiguration
  ) {}

  get enabled(): boolean {
    return this.openTelemetry?.builder !== undefined || this.applicationInsights !== undefined;
  }

  async flush(): Promise<void> {
    await this.openTelemetry?.builder?.forceFlush();
    this.applicationInsights?.client.flush();
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.applicationInsights?.client.flush();
    await this.openTelemetry?.builder?.shutdown();
  }
}

export class HostTelemetrySetup {
  constructor(
    private readonly context: HostContext,
    private readonly loggingBuilder: LoggingBuilder,
    private readonly state: HostRuntimeState,
    private readonly options: HostTelemetryOptions = {}
  ) {}

  postConfigure(hostOptions: ScriptJobHostOptions): HostTelemetry {
    const logger = this.options.logger ?? createNullLogger();

    if (hostOptions.telemetryMode === 'openTelemetry') {
      const builder = new OpenTelemetryBuilder();
      wireHostInstanceId(builder, hostOptions);

      const result = configureOpenTelemetry(this.loggingBuilder, this.context, this.state, {
        hostOptions,
        builder,
        exporterFactory: this.options.exporterFactory,
        logger,
      });
      if (result.builder && this.options.registerGlobalProviders) {
        result.builder.register();
      }
      logger.debug({ sdkEnabled: result.builder !== undefined }, 'OpenTelemetry configured');
      return new HostTelemetry(hostOptions.telemetryMode, result);
    }

    if (hostOptions.telemetryMode === 'applicationInsights') {
      // Nothing is sent unless a key or connection string is set
      const configured = configureApplicationInsights(this.context, this.loggingBuilder, {
        clientFactory: this.options.clientFactory,
        hostInstanceId: hostOptions.instanceId,
        placeholderMode: this.options.placeholderMode,
      });
      logger.debug({ configured: configured !== undefined }, 'Application Insights configured');
      return new HostTelemetry(hostOptions.telemetryMode, undefined, configured);
    }

    return new HostTelemetry(hostOptions.telemetryMode);
  }
}
