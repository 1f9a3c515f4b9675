/**
 * Enrichment processors
 *
 * Stamp spans and log records with the host instance id and process id.
 */

import type { Context } from '@opentelemetry/api';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { LogRecordProcessor } from '@opentelemetry/sdk-logs';
import { SCRIPT_CONSTANTS } from '@fnhost/kernel';

type EmittedLogRecord = Parameters<LogRecordProcessor['onEmit']>[0];

interface AttributeTarget {
  setAttribute(key: string, value: string | number): unknown;
}

function enrich(target: AttributeTarget, hostInstanceId: string | undefined, processId: number): void {
  if (hostInstanceId && hostInstanceId.trim() !== '') {
    target.setAttribute(SCRIPT_CONSTANTS.LOG_PROPERTY_HOST_INSTANCE_ID, hostInstanceId);
  }
  target.setAttribute(SCRIPT_CONSTANTS.LOG_PROPERTY_PROCESS_ID, processId);
}

export class SpanEnrichmentProcessor implements SpanProcessor {
  constructor(
    private readonly hostInstanceId: string | undefined,
    private readonly processId: number = process.pid
  ) {}

  onStart(span: Span, _parentContext: Context): void {
    enrich(span, this.hostInstanceId, this.processId);
  }

  onEnd(_span: ReadableSpan): void {}

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}

export class LogEnrichmentProcessor implements LogRecordProcessor {
  constructor(
    private readonly hostInstanceId: string | undefined,
    private readonly processId: number = process.pid
  ) {}

  onEmit(logRecord: EmittedLogRecord, _context?: Context): void {
    enrich(logRecord, this.hostInstanceId, this.processId);
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}
