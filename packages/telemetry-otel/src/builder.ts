/**
 * OpenTelemetry builder
 *
 * Collects processors, readers, views and resource attributes while the
 * host is configured, then creates the three SDK providers over one
 * shared resource.
 */

import { trace, metrics, type Attributes } from '@opentelemetry/api';
import { logs } from '@opentelemetry/api-logs';
import type { Resource } from '@opentelemetry/resources';
import { BasicTracerProvider, type SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { MeterProvider, type MetricReader, type ViewOptions } from '@opentelemetry/sdk-metrics';
import { LoggerProvider, type LogRecordProcessor } from '@opentelemetry/sdk-logs';
import { HostError, ERROR_CODES } from '@fnhost/kernel';
import { ResourceBuilder } from './resource.js';

export interface OpenTelemetryProviders {
  resource: Resource;
  tracerProvider: BasicTracerProvider;
  meterProvider: MeterProvider;
  loggerProvider: LoggerProvider;
}

export class OpenTelemetryBuilder {
  private readonly spanProcessors: SpanProcessor[] = [];
  private readonly metricReaders: MetricReader[] = [];
  private readonly views: ViewOptions[] = [];
  private readonly logRecordProcessors: LogRecordProcessor[] = [];
  private readonly resource = new ResourceBuilder();
  private providers?: OpenTelemetryProviders;
  private registered = false;

  addSpanProcessor(processor: SpanProcessor): this {
    this.assertNotBuilt();
    this.spanProcessors.push(processor);
    return this;
  }

  addMetricReader(reader: MetricReader): this {
    this.assertNotBuilt();
    this.metricReaders.push(reader);
    return this;
  }

  addView(view: ViewOptions): this {
    this.assertNotBuilt();
    this.views.push(view);
    return this;
  }

  addLogRecordProcessor(processor: LogRecordProcessor): this {
    this.assertNotBuilt();
    this.logRecordProcessors.push(processor);
    return this;
  }

  configureResource(configure: (resource: ResourceBuilder) => void): this {
    this.assertNotBuilt();
    configure(this.resource);
    return this;
  }

  get spanProcessorCount(): number {
    return this.spanProcessors.length;
  }

  get metricReaderCount(): number {
    return this.metricReaders.length;
  }

  get logRecordProcessorCount(): number {
    return this.logRecordProcessors.length;
  }

  get viewOptions(): readonly ViewOptions[] {
    return this.views;
  }

  get resourceAttributes(): Attributes {
    return this.resource.getAttributes();
  }

  /**
   * Create the providers on first call; later calls return the same ones.
   */
  build(): OpenTelemetryProviders {
    if (this.providers) {
      return this.providers;
    }

    const resource = this.resource.build();
    this.providers = {
      resource,
      tracerProvider: new BasicTracerProvider({ resource, spanProcessors: [...this.spanProcessors] }),
      meterProvider: new MeterProvider({ resource, readers: [...this.metricReaders], views: [...this.views] }),
      loggerProvider: new LoggerProvider({ resource, processors: [...this.logRecordProcessors] }),
    };
    return this.providers;
  }

  /**
   * Install the providers as the process-wide OpenTelemetry globals.
   */
  register(): OpenTelemetryProviders {
    const providers = this.build();
    if (!this.registered) {
      trace.setGlobalTracerProvider(providers.tracerProvider);
      metrics.setGlobalMeterProvider(providers.meterProvider);
      logs.setGlobalLoggerProvider(providers.loggerProvider);
      this.registered = true;
    }
    return providers;
  }

  async forceFlush(): Promise<void> {
    if (!this.providers) {
      return;
    }
    await Promise.all([
      this.providers.tracerProvider.forceFlush(),
      this.providers.meterProvider.forceFlush(),
      this.providers.loggerProvider.forceFlush(),
    ]);
  }

  async shutdown(): Promise<void> {
    if (!this.providers) {
      return;
    }
    const { tracerProvider, meterProvider, loggerProvider } = this.providers;
    await Promise.all([tracerProvider.shutdown(), meterProvider.shutdown(), loggerProvider.shutdown()]);

    if (this.registered) {
      trace.disable();
      metrics.disable();
      logs.disable();
      this.registered = false;
    }
  }

  private assertNotBuilt(): void {
    if (this.providers) {
      throw new HostError(ERROR_CODES.E_CONFIG_INVALID, 'OpenTelemetry providers have already been built');
    }
  }
}
