/**
 * Application Insights telemetry processors
 *
 * Processors see every envelope before it is sent and return false to
 * drop it. They run in the order they were added to the client.
 */

import { sanitize } from '@fnhost/privacy';

export const ENVELOPE_BASE_TYPES = {
  REQUEST: 'RequestData',
  DEPENDENCY: 'RemoteDependencyData',
  MESSAGE: 'MessageData',
  EXCEPTION: 'ExceptionData',
} as const;

/**
 * The part of an outgoing envelope the processors read and rewrite
 */
export interface TelemetryEnvelope {
  name: string;
  tags?: Record<string, string>;
  data: {
    baseType?: string;
    baseData?: unknown;
  };
}

export type TelemetryProcessor = (envelope: TelemetryEnvelope, context?: Record<string, unknown>) => boolean;

const WORKER_RPC_SERVICE = 'FunctionRpc';
const LOOPBACK_HOSTS = ['127.0.0.1', 'localhost', '::1', '[::1]'];

/**
 * Drops dependency telemetry for calls on the language worker channel.
 */
export const workerTraceFilter: TelemetryProcessor = (envelope) => {
  const dependency = baseDataOf(envelope, ENVELOPE_BASE_TYPES.DEPENDENCY);
  if (!dependency) {
    return true;
  }

  const name = stringField(dependency, 'name') ?? '';
  const data = stringField(dependency, 'data') ?? '';
  if (name.includes(WORKER_RPC_SERVICE) || data.includes(WORKER_RPC_SERVICE)) {
    return false;
  }

  const type = stringField(dependency, 'type')?.toLowerCase();
  const target = stringField(dependency, 'target');
  return !(type === 'grpc' && target !== undefined && isLoopback(target));
};

export interface ScriptTelemetryProcessorOptions {
  /** When false every dependency envelope is dropped */
  enableDependencyTracking: boolean;
}

/**
 * Redacts credentials from request and dependency URLs, and drops
 * dependencies when dependency tracking is off.
 */
export function createScriptTelemetryProcessor(options: ScriptTelemetryProcessorOptions): TelemetryProcessor {
  return (envelope) => {
    const request = baseDataOf(envelope, ENVELOPE_BASE_TYPES.REQUEST);
    if (request) {
      sanitizeFields(request, ['url', 'name']);
      return true;
    }

    const dependency = baseDataOf(envelope, ENVELOPE_BASE_TYPES.DEPENDENCY);
    if (dependency) {
      if (!options.enableDependencyTracking) {
        return false;
      }
      sanitizeFields(dependency, ['data', 'name']);
    }
    return true;
  };
}

function baseDataOf(envelope: TelemetryEnvelope, baseType: string): Record<string, unknown> | undefined {
  const { data } = envelope;
  if (data.baseType !== baseType || !isRecord(data.baseData)) {
    return undefined;
  }
  return data.baseData;
}

function sanitizeFields(target: Record<string, unknown>, fields: readonly string[]): void {
  for (const field of fields) {
    const value = target[field];
    if (typeof value === 'string') {
      target[field] = sanitize(value);
    }
  }
}

function stringField(target: Record<string, unknown>, field: string): string | undefined {
  const value = target[field];
  return typeof value === 'string' ? value : undefined;
}

function isLoopback(target: string): boolean {
  const lower = target.toLowerCase();
  return LOOPBACK_HOSTS.some((host) => lower === host || lower.startsWith(`${host}:`));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
