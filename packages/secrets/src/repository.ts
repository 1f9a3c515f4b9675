/**
 * Secrets repositories
 *
 * Repositories store serialized secrets by type and scope (the function
 * name for function secrets), keep snapshots of secrets that could not be
 * decrypted, and report changes so cached secrets can be dropped.
 */

import { EventEmitter } from 'events';
import type { Logger } from '@fnhost/logging';
import type { ScriptSecretsType, SecretsChangedEvent, SecretsChangedListener } from './types.js';

const SECRETS_CHANGED = 'secretsChanged';

export interface SecretsRepository {
  read(type: ScriptSecretsType, scope?: string): Promise<string | undefined>;
  write(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void>;
  writeSnapshot(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void>;
  /** Snapshot ids for the scope, oldest first */
  getSecretSnapshots(type: ScriptSecretsType, scope?: string): Promise<string[]>;
  readSnapshot(id: string): Promise<string | undefined>;
  /** Delete function secrets for functions not in `currentFunctions` */
  purgeOldSecrets(currentFunctions: readonly string[], logger: Logger): Promise<void>;
  /** @returns a function that removes the listener */
  onSecretsChanged(listener: SecretsChangedListener): () => void;
  dispose(): void | Promise<void>;
}

export const HOST_SCOPE_NAME = 'host';

/**
 * Storage name of a scope: `host` for host secrets, the function name otherwise.
 */
export function scopeName(type: ScriptSecretsType, scope?: string): string {
  return type === 'host' ? HOST_SCOPE_NAME : (scope ?? '').toLowerCase();
}

/**
 * Snapshot timestamp, `yyyyMMddHHmmssSSS` in UTC
 */
export function snapshotTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:.TZ]/g, '');
}

export abstract class BaseSecretsRepository implements SecretsRepository {
  private readonly events = new EventEmitter();

  abstract read(type: ScriptSecretsType, scope?: string): Promise<string | undefined>;
  abstract write(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void>;
  abstract writeSnapshot(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void>;
  abstract getSecretSnapshots(type: ScriptSecretsType, scope?: string): Promise<string[]>;
  abstract readSnapshot(id: string): Promise<string | undefined>;
  abstract purgeOldSecrets(currentFunctions: readonly string[], logger: Logger): Promise<void>;

  onSecretsChanged(listener: SecretsChangedListener): () => void {
    this.events.on(SECRETS_CHANGED, listener);
    return () => {
      this.events.off(SECRETS_CHANGED, listener);
    };
  }

  dispose(): void | Promise<void> {
    this.events.removeAllListeners();
  }

  protected emitSecretsChanged(event: SecretsChangedEvent): void {
    this.events.emit(SECRETS_CHANGED, event);
  }
}

/**
 * Repository held in process memory; used in tests and by `memory` storage.
 */
export class InMemorySecretsRepository extends BaseSecretsRepository {
  private readonly secrets = new Map<string, string>();
  private readonly snapshots = new Map<string, string>();

  async read(type: ScriptSecretsType, scope?: string): Promise<string | undefined> {
    return this.secrets.get(scopeName(type, scope));
  }

  async write(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void> {
    const name = scopeName(type, scope);
    this.secrets.set(name, content);
    this.emitSecretsChanged(type === 'host' ? { type } : { type, name });
  }

  async writeSnapshot(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void> {
    const prefix = `${scopeName(type, scope)}.${snapshotTimestamp()}`;
    let id = `${prefix}.snapshot`;
    for (let n = 1; this.snapshots.has(id); n++) {
      id = `${prefix}${n}.snapshot`;
    }
    this.snapshots.set(id, content);
  }

  async getSecretSnapshots(type: ScriptSecretsType, scope?: string): Promise<string[]> {
    const prefix = `${scopeName(type, scope)}.`;
    return [...this.snapshots.keys()].filter((id) => id.startsWith(prefix) && isSnapshotOf(id, prefix)).sort();
  }

  async readSnapshot(id: string): Promise<string | undefined> {
    return this.snapshots.get(id);
  }

  toString(): string {
    return 'InMemorySecretsRepository';
  }

  async purgeOldSecrets(currentFunctions: readonly string[], logger: Logger): Promise<void> {
    const keep = new Set(currentFunctions.map((name) => name.toLowerCase()));
    for (const name of [...this.secrets.keys()]) {
      if (name !== HOST_SCOPE_NAME && !keep.has(name)) {
        this.secrets.delete(name);
        logger.info({ functionName: name }, 'Deleted secrets of removed function');
      }
    }
  }
}

/**
 * True when `id` is `<prefix><digits>.snapshot`
 */
export function isSnapshotOf(id: string, prefix: string): boolean {
  return /^\d+\.snapshot$/.test(id.slice(prefix.length));
}
