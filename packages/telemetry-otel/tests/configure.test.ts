/**
 * @fnhost/telemetry-otel - pipeline configuration tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { SpanKind } from '@opentelemetry/api';
import { AggregationType } from '@opentelemetry/sdk-metrics';
import { LoggerFactory, LoggingBuilder } from '@fnhost/logging';
import { HostRuntimeState } from '@fnhost/telemetry';
import { configureOpenTelemetry, isOpenTelemetrySdkDisabled, type OpenTelemetryBuilder } from '../src/index.js';
import { captureDestination, hostContext, memoryExporterFactory } from './helpers.js';

const HOST_OPTIONS = { instanceId: 'host-1', rootScriptPath: '/home/site/wwwroot', telemetryMode: 'openTelemetry' } as const;

describe('isOpenTelemetrySdkDisabled', () => {
  it('is disabled unless explicitly set to a non-true value', () => {
    expect(isOpenTelemetrySdkDisabled({})).toBe(true);
    expect(isOpenTelemetrySdkDisabled({ OTEL_SDK_DISABLED: 'True' })).toBe(true);
    expect(isOpenTelemetrySdkDisabled({ OTEL_SDK_DISABLED: 'false' })).toBe(false);
    expect(isOpenTelemetrySdkDisabled({ OTEL_SDK_DISABLED: 'no' })).toBe(false);
  });
});

describe('configureOpenTelemetry', () => {
  let builder: OpenTelemetryBuilder | undefined;

  afterEach(async () => {
    await builder?.shutdown();
    builder = undefined;
  });

  it('configures nothing while the SDK is disabled', () => {
    const loggingBuilder = new LoggingBuilder();

    const result = configureOpenTelemetry(loggingBuilder, hostContext({}, {}), new HostRuntimeState());

    expect(result).toEqual({ appInsightsConfigured: false });
    expect(loggingBuilder.registeredSinks).toHaveLength(0);
    expect(loggingBuilder.registeredFilters).toHaveLength(0);
  });

  it('adds the base processors, filters and log sink without exporters', () => {
    const loggingBuilder = new LoggingBuilder();

    const result = configureOpenTelemetry(loggingBuilder, hostContext({}), new HostRuntimeState());
    builder = result.builder;

    expect(result.appInsightsConfigured).toBe(false);
    expect(builder?.spanProcessorCount).toBe(2);
    expect(builder?.logRecordProcessorCount).toBe(1);
    expect(builder?.metricReaderCount).toBe(0);
    expect(loggingBuilder.registeredFilters.map((f) => f.pattern)).toEqual(['Host.Function.Console', 'Function.*']);
    expect(loggingBuilder.registeredSinks.map((s) => s.name)).toEqual(['opentelemetry']);
  });

  it('registers a global OTLP exporter for every signal', () => {
    const memory = memoryExporterFactory();

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({
        'AzureFunctionsJobHost:openTelemetry:exporters:collector:Endpoint': 'http://collector:4318',
        'AzureFunctionsJobHost:openTelemetry:exporters:collector:headers': 'x-api-key=test-secret',
        'AzureFunctionsJobHost:openTelemetry:exporters:collector:exportProcessorType': 'Simple',
      }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory }
    );
    builder = result.builder;

    expect(memory.calls).toEqual(['otlp:logs:collector', 'otlp:metrics:collector', 'otlp:traces:collector']);
    expect(memory.otlpOptions[0]).toEqual({
      endpoint: 'http://collector:4318',
      headers: 'x-api-key=test-secret',
      exportProcessorType: 'simple',
    });
    expect(builder?.spanProcessorCount).toBe(3);
    expect(builder?.metricReaderCount).toBe(1);
    expect(builder?.logRecordProcessorCount).toBe(2);
  });

  it('registers signal-specific exporters for their signal only', () => {
    const memory = memoryExporterFactory();

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({
        'AzureFunctionsJobHost:logging:openTelemetry:exporters:console:enabled': 'true',
        'AzureFunctionsJobHost:metrics:openTelemetry:exporters:metricsCollector:endpoint': 'http://metrics:4318',
        'AzureFunctionsJobHost:traces:openTelemetry:exporters:traceCollector:endpoint': 'http://traces:4318',
      }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory }
    );
    builder = result.builder;

    expect(memory.calls).toEqual(['console:logs', 'otlp:metrics:metricsCollector', 'otlp:traces:traceCollector']);
  });

  it('honors azureMonitor once and only where logging is included', () => {
    const memory = memoryExporterFactory();

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({
        'AzureFunctionsJobHost:openTelemetry:exporters:azureMonitor:connectionString': 'InstrumentationKey=test-key',
        'AzureFunctionsJobHost:logging:openTelemetry:exporters:AzureMonitor:connectionString': 'InstrumentationKey=other',
        'AzureFunctionsJobHost:traces:openTelemetry:exporters:azureMonitor:connectionString': 'InstrumentationKey=ignored',
      }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory }
    );
    builder = result.builder;

    expect(result.appInsightsConfigured).toBe(true);
    expect(memory.calls).toEqual(['azureMonitor']);
    expect(memory.azureMonitorOptions[0].connectionString).toBe('InstrumentationKey=test-key');
  });

  it('ignores azureMonitor at the traces level', () => {
    const memory = memoryExporterFactory();

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({
        'AzureFunctionsJobHost:traces:openTelemetry:exporters:azureMonitor:connectionString': 'InstrumentationKey=ignored',
      }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory }
    );
    builder = result.builder;

    expect(result.appInsightsConfigured).toBe(false);
    expect(memory.calls).toEqual([]);
  });

  it('falls back to the configured connection string for azureMonitor', () => {
    const memory = memoryExporterFactory();

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({
        'AzureFunctionsJobHost:openTelemetry:exporters:azureMonitor:disableOfflineStorage': 'true',
        APPLICATIONINSIGHTS_CONNECTION_STRING: 'InstrumentationKey=from-settings',
      }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory }
    );
    builder = result.builder;

    expect(memory.azureMonitorOptions[0]).toEqual({
      connectionString: 'InstrumentationKey=from-settings',
      disableOfflineStorage: true,
    });
  });

  it('warns about geneva and registers nothing for it', () => {
    const memory = memoryExporterFactory();
    const destination = captureDestination();
    const logger = new LoggerFactory({ destination }).createLogger('Host.General');

    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({ 'AzureFunctionsJobHost:openTelemetry:exporters:geneva:connectionString': 'EtwSession=test' }),
      new HostRuntimeState(),
      { exporterFactory: memory.factory, logger }
    );
    builder = result.builder;

    expect(memory.calls).toEqual([]);
    expect(destination.messages()).toEqual(['Geneva exporter is not supported on this runtime; ignoring']);
  });

  it('adds drop views for disabled metrics', () => {
    const result = configureOpenTelemetry(
      new LoggingBuilder(),
      hostContext({ 'Metrics:EnabledMetrics:orders': 'false', 'Metrics:EnabledMetrics:billing': 'true' }),
      new HostRuntimeState()
    );
    builder = result.builder;

    expect(builder?.viewOptions).toEqual([
      { meterName: 'orders', instrumentName: '*', aggregation: { type: AggregationType.DROP } },
    ]);
  });

  describe('exported spans', () => {
    function configureSpans(values: Record<string, string> = {}) {
      const memory = memoryExporterFactory();
      const result = configureOpenTelemetry(
        new LoggingBuilder(),
        hostContext({
          'AzureFunctionsJobHost:traces:openTelemetry:exporters:collector:endpoint': 'http://collector:4318',
          'AzureFunctionsJobHost:traces:openTelemetry:exporters:collector:exportProcessorType': 'simple',
          ...values,
        }),
        new HostRuntimeState(),
        { exporterFactory: memory.factory, hostOptions: HOST_OPTIONS }
      );
      builder = result.builder;
      return { memory, providers: result.builder?.build() };
    }

    it('are sanitized and enriched', async () => {
      const { memory, providers } = configureSpans();
      const span = providers?.tracerProvider.getTracer('test').startSpan('GET /api/hello', {
        attributes: { 'url.full': 'https://fn.example.net/api/hello?code=test-secret' },
      });
      span?.end();
      await builder?.forceFlush();

      const [exported] = memory.spans.getFinishedSpans();
      expect(exported.attributes['url.full']).toBe('https://fn.example.net/api/hello[Hidden Credential]');
      expect(exported.attributes['HostInstanceId']).toBe('host-1');
      expect(exported.attributes['ProcessId']).toBe(process.pid);
    });

    it('drop client calls to ingestion and configured endpoints', async () => {
      const { memory, providers } = configureSpans();
      const tracer = providers?.tracerProvider.getTracer('@opentelemetry/instrumentation-undici');

      tracer
        ?.startSpan('POST', { kind: SpanKind.CLIENT, attributes: { 'server.address': 'westus-0.in.applicationinsights.azure.com' } })
        .end();
      tracer?.startSpan('POST', { kind: SpanKind.CLIENT, attributes: { 'url.full': 'http://collector:4318/v1/traces' } }).end();
      tracer?.startSpan('GET', { kind: SpanKind.CLIENT, attributes: { 'server.address': 'api.example.com' } }).end();
      await builder?.forceFlush();

      expect(memory.spans.getFinishedSpans().map((s) => s.attributes['server.address'])).toEqual(['api.example.com']);
    });

    it('drop spans of disabled instrumentations', async () => {
      const { memory, providers } = configureSpans({
        'Traces:EnabledTraces:@opentelemetry/instrumentation-http': 'false',
      });

      providers?.tracerProvider.getTracer('@opentelemetry/instrumentation-http').startSpan('GET').end();
      providers?.tracerProvider.getTracer('orders').startSpan('process').end();
      await builder?.forceFlush();

      expect(memory.spans.getFinishedSpans().map((s) => s.name)).toEqual(['process']);
    });
  });

  describe('exported logs', () => {
    function configureLogs(state: HostRuntimeState, values: Record<string, string> = {}) {
      const memory = memoryExporterFactory();
      const loggingBuilder = new LoggingBuilder().setDestination(captureDestination());
      const result = configureOpenTelemetry(
        loggingBuilder,
        hostContext({
          'AzureFunctionsJobHost:logging:openTelemetry:exporters:collector:endpoint': 'http://collector:4318',
          'AzureFunctionsJobHost:logging:openTelemetry:exporters:collector:exportProcessorType': 'simple',
          ...values,
        }),
        state,
        { exporterFactory: memory.factory, hostOptions: HOST_OPTIONS }
      );
      builder = result.builder;
      return { memory, loggerFactory: loggingBuilder.build() };
    }

    it('carry attributes and host enrichment', async () => {
      const { memory, loggerFactory } = configureLogs(new HostRuntimeState());

      loggerFactory.createLogger('Host.General').info({ functionName: 'hello' }, 'hi');
      await builder?.forceFlush();

      const [record] = memory.logs.getFinishedLogRecords();
      expect(record.body).toBe('hi');
      expect(record.severityText).toBe('INFO');
      expect(record.instrumentationScope.name).toBe('Host.General');
      expect(record.attributes).toEqual({ functionName: 'hello', HostInstanceId: 'host-1', ProcessId: process.pid });
    });

    it('use the formatted message and scopes when enabled', async () => {
      const { memory, loggerFactory } = configureLogs(new HostRuntimeState(), {
        'AzureFunctionsJobHost:logging:openTelemetry:includeFormattedMessage': 'true',
        'AzureFunctionsJobHost:logging:openTelemetry:includeScopes': 'true',
      });

      loggerFactory.createLogger('Host.General').child({ invocationId: 'inv-1' }).info('took %d ms', 5);
      await builder?.forceFlush();

      const [record] = memory.logs.getFinishedLogRecords();
      expect(record.body).toBe('took 5 ms');
      expect(record.attributes['invocationId']).toBe('inv-1');
    });

    it('drop worker console and function logs while the worker sends its own', async () => {
      const state = new HostRuntimeState();
      const { memory, loggerFactory } = configureLogs(state);

      state.workerApplicationInsightsLoggingEnabled = true;
      loggerFactory.createLogger('Host.Function.Console').info('console');
      loggerFactory.createLogger('Function.hello.User').info('user');
      loggerFactory.createLogger('Host.General').info('host');
      state.workerApplicationInsightsLoggingEnabled = false;
      loggerFactory.createLogger('Function.hello.User').info('user again');
      await builder?.forceFlush();

      expect(memory.logs.getFinishedLogRecords().map((r) => r.body)).toEqual(['host', 'user again']);
    });
  });
});
