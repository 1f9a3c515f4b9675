/**
 * @fnhost/host - telemetry setup tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { LoggingBuilder } from '@fnhost/logging';
import { HostRuntimeState, type HostContext, type TelemetryMode } from '@fnhost/telemetry';
import { HostTelemetrySetup, type HostTelemetry } from '../src/index.js';
import { FakeAppInsightsClient, configuration } from './helpers.js';

function hostOptions(telemetryMode: TelemetryMode) {
  return { instanceId: 'host-1', rootScriptPath: '/home/site/wwwroot', telemetryMode };
}

describe('HostTelemetrySetup', () => {
  let telemetry: HostTelemetry | undefined;

  afterEach(async () => {
    await telemetry?.dispose();
    telemetry = undefined;
  });

  it('wires OpenTelemetry with the host instance id', () => {
    const context: HostContext = { configuration: configuration({}), environment: { OTEL_SDK_DISABLED: 'false' } };
    const loggingBuilder = new LoggingBuilder();

    telemetry = new HostTelemetrySetup(context, loggingBuilder, new HostRuntimeState()).postConfigure(
      hostOptions('openTelemetry')
    );

    expect(telemetry.mode).toBe('openTelemetry');
    expect(telemetry.enabled).toBe(true);
    expect(telemetry.openTelemetry?.builder?.resourceAttributes['HostInstanceId']).toBe('host-1');
    expect(loggingBuilder.registeredSinks.map((s) => s.name)).toEqual(['opentelemetry']);
  });

  it('leaves OpenTelemetry off while the SDK is disabled', () => {
    const context: HostContext = { configuration: configuration({}), environment: {} };
    const loggingBuilder = new LoggingBuilder();

    telemetry = new HostTelemetrySetup(context, loggingBuilder, new HostRuntimeState()).postConfigure(
      hostOptions('openTelemetry')
    );

    expect(telemetry.enabled).toBe(false);
    expect(telemetry.openTelemetry).toEqual({ appInsightsConfigured: false });
    expect(loggingBuilder.registeredSinks).toHaveLength(0);
  });

  it('wires Application Insights with the host instance id', async () => {
    const client = new FakeAppInsightsClient();
    const context: HostContext = {
      configuration: configuration({ APPINSIGHTS_INSTRUMENTATIONKEY: 'test-key' }),
      environment: {},
    };
    const loggingBuilder = new LoggingBuilder();

    telemetry = new HostTelemetrySetup(context, loggingBuilder, new HostRuntimeState(), {
      clientFactory: () => client,
    }).postConfigure(hostOptions('applicationInsights'));

    expect(telemetry.enabled).toBe(true);
    expect(telemetry.applicationInsights?.client).toBe(client);
    expect(client.commonProperties['HostInstanceId']).toBe('host-1');
    expect(loggingBuilder.registeredSinks.map((s) => s.name)).toEqual(['applicationinsights']);

    await telemetry.flush();
    expect(client.flushed).toBe(1);
  });

  it('configures nothing in none mode', () => {
    const context: HostContext = {
      configuration: configuration({ APPINSIGHTS_INSTRUMENTATIONKEY: 'test-key' }),
      environment: { OTEL_SDK_DISABLED: 'false' },
    };
    const loggingBuilder = new LoggingBuilder();

    telemetry = new HostTelemetrySetup(context, loggingBuilder, new HostRuntimeState()).postConfigure(hostOptions('none'));

    expect(telemetry.enabled).toBe(false);
    expect(loggingBuilder.registeredSinks).toHaveLength(0);
  });
});
