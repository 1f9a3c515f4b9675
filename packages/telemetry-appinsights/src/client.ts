/**
 * Telemetry client seam
 *
 * The host only needs a handful of client members; tests provide a fake
 * with the same shape instead of the SDK client.
 */

import { Contracts, TelemetryClient } from 'applicationinsights';
import type { TelemetryProcessor } from './processors.js';

export type SeverityLevel = Contracts.SeverityLevel;

export interface TraceItem {
  message: string;
  severity?: SeverityLevel;
  properties?: Record<string, string>;
}

export interface ExceptionItem {
  exception: Error;
  severity?: SeverityLevel;
  properties?: Record<string, string>;
}

export interface AppInsightsClient {
  commonProperties: Record<string, string>;
  addTelemetryProcessor(processor: TelemetryProcessor): void;
  trackTrace(telemetry: TraceItem): void;
  trackException(telemetry: ExceptionItem): void;
  flush(): void;
}

export interface ClientSettings {
  instrumentationKey?: string;
  connectionString?: string;
  /** No key or connection string; the client is created but sends nothing */
  disabled: boolean;
}

export type AppInsightsClientFactory = (settings: ClientSettings) => AppInsightsClient;

export const defaultClientFactory: AppInsightsClientFactory = (settings) => {
  const client = new TelemetryClient(settings.connectionString || settings.instrumentationKey);
  client.config.disableAppInsights = settings.disabled;
  return client;
};
