/**
 * File system secrets repository
 *
 * Layout of the secrets directory:
 *
 *   host.json                               host secrets
 *   <function>.json                         function secrets
 *   <scope>.<timestamp>.snapshot.json       undecryptable secrets backups
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { watch, type FSWatcher } from 'chokidar';
import type { Logger } from '@fnhost/logging';
import {
  BaseSecretsRepository,
  HOST_SCOPE_NAME,
  isSnapshotOf,
  scopeName,
  snapshotTimestamp,
} from './repository.js';
import type { ScriptSecretsType } from './types.js';

const SECRETS_EXTENSION = '.json';
const SNAPSHOT_SUFFIX = '.snapshot';

export interface FileSystemSecretsRepositoryOptions {
  /** Watch the directory and report changes made by other processes */
  watch?: boolean;
}

export class FileSystemSecretsRepository extends BaseSecretsRepository {
  private watcher?: FSWatcher;

  constructor(
    readonly directory: string,
    options: FileSystemSecretsRepositoryOptions = {}
  ) {
    super();
    if (options.watch) {
      this.watcher = watch(directory, { ignoreInitial: true, depth: 0 }).on('all', (_event, filePath) =>
        this.onFileChanged(filePath)
      );
    }
  }

  async read(type: ScriptSecretsType, scope?: string): Promise<string | undefined> {
    return readIfExists(this.secretsPath(type, scope));
  }

  async write(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.secretsPath(type, scope), content, 'utf8');
    const name = scopeName(type, scope);
    this.emitSecretsChanged(type === 'host' ? { type } : { type, name });
  }

  async writeSnapshot(type: ScriptSecretsType, scope: string | undefined, content: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const prefix = `${scopeName(type, scope)}.${snapshotTimestamp()}`;
    let id = `${prefix}${SNAPSHOT_SUFFIX}`;
    for (let n = 1; await exists(this.snapshotPath(id)); n++) {
      id = `${prefix}${n}${SNAPSHOT_SUFFIX}`;
    }
    await fs.writeFile(this.snapshotPath(id), content, 'utf8');
  }

  async getSecretSnapshots(type: ScriptSecretsType, scope?: string): Promise<string[]> {
    const prefix = `${scopeName(type, scope)}.`;
    return (await this.listJsonFiles())
      .map((file) => file.slice(0, -SECRETS_EXTENSION.length))
      .filter((id) => id.toLowerCase().startsWith(prefix) && isSnapshotOf(id, prefix))
      .sort();
  }

  async readSnapshot(id: string): Promise<string | undefined> {
    return readIfExists(this.snapshotPath(id));
  }

  async purgeOldSecrets(currentFunctions: readonly string[], logger: Logger): Promise<void> {
    const keep = new Set(currentFunctions.map((name) => name.toLowerCase()));

    for (const file of await this.listJsonFiles()) {
      const name = file.slice(0, -SECRETS_EXTENSION.length).toLowerCase();
      if (name === HOST_SCOPE_NAME || name.endsWith(SNAPSHOT_SUFFIX) || keep.has(name)) {
        continue;
      }
      await fs.rm(path.join(this.directory, file), { force: true });
      logger.info({ functionName: name }, 'Deleted secrets of removed function');
    }
  }

  async dispose(): Promise<void> {
    await super.dispose();
    await this.watcher?.close();
    this.watcher = undefined;
  }

  toString(): string {
    return `FileSystemSecretsRepository(${this.directory})`;
  }

  private secretsPath(type: ScriptSecretsType, scope?: string): string {
    return path.join(this.directory, `${scopeName(type, scope)}${SECRETS_EXTENSION}`);
  }

  private snapshotPath(id: string): string {
    return path.join(this.directory, `${id}${SECRETS_EXTENSION}`);
  }

  private async listJsonFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }
    return entries.filter((file) => file.toLowerCase().endsWith(SECRETS_EXTENSION));
  }

  private onFileChanged(filePath: string): void {
    const file = path.basename(filePath).toLowerCase();
    if (!file.endsWith(SECRETS_EXTENSION)) {
      return;
    }
    const name = file.slice(0, -SECRETS_EXTENSION.length);
    if (name.endsWith(SNAPSHOT_SUFFIX)) {
      return;
    }
    this.emitSecretsChanged(name === HOST_SCOPE_NAME ? { type: 'host' } : { type: 'function', name });
  }
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      return undefined;
    }
    throw err;
  }
}

async function exists(filePath: string): Promise<boolean> {
  return (await readIfExists(filePath)) !== undefined;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
