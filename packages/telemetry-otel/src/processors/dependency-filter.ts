/**
 * Dependency trace filter
 *
 * Wraps an exporting span processor and drops internal noise before it
 * reaches the exporter: client calls to telemetry ingestion endpoints and
 * spans from instrumentations disabled in configuration.
 */

import { SpanKind, type Context } from '@opentelemetry/api';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { PEER_ATTRIBUTES, URL_ATTRIBUTES } from '@fnhost/telemetry';

/**
 * Ingestion hosts; a leading dot matches any subdomain.
 */
export const TELEMETRY_INGESTION_HOSTS: readonly string[] = [
  '.applicationinsights.azure.com',
  'dc.services.visualstudio.com',
  'rt.services.visualstudio.com',
  '.livediagnostics.monitor.azure.com',
];

/**
 * Shared, growing filter state. Exporter registration adds OTLP endpoints
 * and configuration adds disabled scopes after processors are created.
 */
export class DependencyFilterState {
  private readonly endpointHosts = new Set<string>();
  private readonly disabledScopes = new Set<string>();

  addEndpoint(endpoint: string): void {
    const host = hostOf(endpoint);
    if (host) {
      this.endpointHosts.add(host);
    }
  }

  disableScope(scopeName: string): void {
    this.disabledScopes.add(scopeName.toLowerCase());
  }

  isDisabledScope(scopeName: string): boolean {
    return this.disabledScopes.has(scopeName.toLowerCase());
  }

  isIngestionHost(host: string): boolean {
    const lower = host.toLowerCase();
    if (this.endpointHosts.has(lower)) {
      return true;
    }
    return TELEMETRY_INGESTION_HOSTS.some((pattern) =>
      pattern.startsWith('.') ? lower.endsWith(pattern) : lower === pattern
    );
  }
}

export class DependencyTraceFilterProcessor implements SpanProcessor {
  constructor(
    private readonly inner: SpanProcessor,
    private readonly state: DependencyFilterState
  ) {}

  onStart(span: Span, parentContext: Context): void {
    this.inner.onStart(span, parentContext);
  }

  onEnd(span: ReadableSpan): void {
    if (this.shouldDrop(span)) {
      return;
    }
    this.inner.onEnd(span);
  }

  forceFlush(): Promise<void> {
    return this.inner.forceFlush();
  }

  shutdown(): Promise<void> {
    return this.inner.shutdown();
  }

  private shouldDrop(span: ReadableSpan): boolean {
    if (this.state.isDisabledScope(span.instrumentationScope.name)) {
      return true;
    }
    if (span.kind !== SpanKind.CLIENT) {
      return false;
    }
    const host = targetHost(span);
    return host !== undefined && this.state.isIngestionHost(host);
  }
}

function targetHost(span: ReadableSpan): string | undefined {
  for (const key of [PEER_ATTRIBUTES.SERVER_ADDRESS, PEER_ATTRIBUTES.LEGACY_NET_PEER_NAME]) {
    const value = span.attributes[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }

  for (const key of [URL_ATTRIBUTES.FULL, URL_ATTRIBUTES.LEGACY_HTTP_URL]) {
    const value = span.attributes[key];
    if (typeof value === 'string') {
      const host = hostOf(value);
      if (host) {
        return host;
      }
    }
  }

  const httpHost = span.attributes[PEER_ATTRIBUTES.LEGACY_HTTP_HOST];
  if (typeof httpHost === 'string' && httpHost !== '') {
    return httpHost.split(':')[0];
  }
  return undefined;
}

function hostOf(url: string): string | undefined {
  try {
    return new URL(url).hostname.toLowerCase() || undefined;
  } catch {
    return undefined;
  }
}
