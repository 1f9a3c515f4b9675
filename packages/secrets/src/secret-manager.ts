/**
 * Secret manager
 *
 * Loads, generates and persists host and function keys. Persisted keys go
 * through the key value converters; callers only ever see plaintext.
 *
 * Host secrets are cached once loaded, function secrets per function. A
 * `secretsChanged` event from the repository drops the matching cache
 * entry so the next read reloads.
 */

import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import {
  CryptographicError,
  HostError,
  ERROR_CODES,
  HOST_KEY_SCOPES,
  SCRIPT_CONSTANTS,
  requireArgument,
  type Disposable,
} from '@fnhost/kernel';
import { createNullLogger, type Logger } from '@fnhost/logging';
import type { KeyValueConverterFactory } from './converters.js';
import type { SecretsRepository } from './repository.js';
import { deserializeFunctionSecrets, deserializeHostSecrets, deserializeSecrets, serializeSecrets } from './serializer.js';
import { Semaphore } from './semaphore.js';
import {
  isHostSecrets,
  type FunctionSecrets,
  type HostSecrets,
  type HostSecretsInfo,
  type Key,
  type KeyOperationResult,
  type OperationResult,
  type ScriptSecrets,
  type ScriptSecretsType,
  type SecretsChangedEvent,
} from './types.js';

export interface SecretManagerOptions {
  repository: SecretsRepository;
  converter: KeyValueConverterFactory;
  logger?: Logger;
  /** Recorded in persisted secrets to tell apart hosts sharing storage */
  hostName?: string;
}

/**
 * A new random secret: 40 bytes, base64, with `+` replaced so the value is
 * safe in a URL.
 */
export function generateSecret(): string {
  return randomBytes(40).toString('base64').replace(/\+/g, 'a');
}

export class SecretManager implements Disposable {
  private readonly repository: SecretsRepository;
  private readonly converter: KeyValueConverterFactory;
  private readonly logger: Logger;
  private readonly hostName?: string;
  private readonly hostSecretsLock = new Semaphore(1);
  private readonly functionSecrets = new Map<string, Record<string, string>>();
  private readonly unsubscribe: () => void;
  private hostSecrets?: HostSecretsInfo;
  private disposed = false;

  constructor(options: SecretManagerOptions) {
    this.repository = options.repository;
    this.converter = options.converter;
    this.logger = options.logger ?? createNullLogger();
    this.hostName = options.hostName;
    this.unsubscribe = this.repository.onSecretsChanged((event) => this.onSecretsChanged(event));

    this.logger.info({ repository: String(this.repository) }, 'Resolved secrets repository');
  }

  async getHostSecrets(): Promise<HostSecretsInfo> {
    this.assertNotDisposed();

    const cached = this.hostSecrets;
    if (cached) {
      return cached;
    }

    return this.hostSecretsLock.use(async () => {
      if (this.hostSecrets) {
        return this.hostSecrets;
      }

      let persisted = await this.loadHostSecrets();
      if (!persisted) {
        this.logger.debug('Generating host secrets');
        persisted = this.generateHostSecrets();
        await this.persist('host', undefined, persisted);
      }

      let secrets: HostSecrets;
      try {
        secrets = this.readHostSecrets(persisted);
      } catch (err) {
        if (!(err instanceof CryptographicError)) {
          throw err;
        }
        this.logger.debug({ err }, 'Host secrets could not be decrypted; regenerating');
        await this.persist('host', undefined, persisted, true);
        secrets = regenerateHostSecrets(persisted);
        await this.refresh('host', undefined, secrets);
      }

      if (hasStaleKeys(allHostKeys(secrets))) {
        this.logger.debug('Host secrets are stale; refreshing');
        await this.refresh('host', undefined, secrets);
      }

      const info: HostSecretsInfo = {
        masterKey: secrets.masterKey.value,
        functionKeys: toRecord(secrets.functionKeys),
        systemKeys: toRecord(secrets.systemKeys),
      };
      this.hostSecrets = info;
      this.logger.info('Host secrets loaded');
      return info;
    });
  }

  /**
   * Keys of a function by name. With `merged`, host function keys the
   * function does not override are included.
   */
  async getFunctionSecrets(functionName: string, merged = false): Promise<Record<string, string>> {
    this.assertNotDisposed();
    const name = requireArgument(functionName, 'functionName').toLowerCase();

    let functionSecrets = this.functionSecrets.get(name);
    if (!functionSecrets) {
      let persisted = await this.loadFunctionSecrets(name);
      if (!persisted) {
        this.logger.info({ functionName: name }, 'Generating secrets for function');
        persisted = this.generateFunctionSecrets();
        await this.persist('function', name, persisted);
      }

      let secrets: FunctionSecrets;
      try {
        secrets = { ...persisted, keys: persisted.keys.map((key) => this.converter.readKey(key)) };
      } catch (err) {
        if (!(err instanceof CryptographicError)) {
          throw err;
        }
        this.logger.info({ functionName: name }, 'Function secrets could not be decrypted; regenerating');
        await this.persist('function', name, persisted, true);
        secrets = { ...persisted, keys: regenerateKeys(persisted.keys) };
        await this.refresh('function', name, secrets);
      }

      if (hasStaleKeys(secrets.keys)) {
        this.logger.info({ functionName: name }, 'Function secrets are stale; refreshing');
        await this.refresh('function', name, secrets);
      }

      functionSecrets = toRecord(secrets.keys);
      this.functionSecrets.set(name, functionSecrets);
    }

    this.logger.info({ functionName: name }, 'Function secrets loaded');
    if (merged) {
      const host = await this.getHostSecrets();
      return { ...host.functionKeys, ...functionSecrets };
    }
    return { ...functionSecrets };
  }

  /**
   * Create or replace a key. A secret is generated when none is given.
   * `keyScope` is the function name for function keys, and
   * `functionkeys` or `systemkeys` for host keys.
   */
  async addOrUpdateFunctionSecret(
    secretName: string,
    secret: string | undefined,
    keyScope: string,
    secretsType: ScriptSecretsType
  ): Promise<KeyOperationResult> {
    this.assertNotDisposed();
    assertSupportedType(secretsType);
    requireArgument(secretName, 'secretName');
    const scope = requireArgument(keyScope, 'keyScope').toLowerCase();
    const value = secret ?? generateSecret();
    let result: OperationResult = 'notFound';

    await this.modifySecrets(secretsType, scope, (secrets) => {
      const keys = keysOf(secrets, scope);
      if (!keys) {
        return false;
      }
      const index = findKeyIndex(keys, secretName);
      const key = this.converter.writeKey({ name: secretName, value, encrypted: false });
      if (index === -1) {
        keys.push(key);
        result = 'created';
      } else {
        keys.splice(index, 1, key);
        result = 'updated';
      }
      return true;
    });

    this.logger.info(
      { secretsType, secretName, keyScope: scope ?? 'host', result },
      'Added or updated secret'
    );
    return { secret: value, result };
  }

  /**
   * Replace the master key; a generated key is `created`, a given one `updated`.
   */
  async setMasterKey(value?: string): Promise<KeyOperationResult> {
    this.assertNotDisposed();
    const secrets = (await this.loadHostSecrets()) ?? this.generateHostSecrets();

    const masterKey = value ?? generateSecret();
    const result: OperationResult = value === undefined ? 'created' : 'updated';

    secrets.masterKey = this.converter.writeKey({
      name: SCRIPT_CONSTANTS.DEFAULT_MASTER_KEY_NAME,
      value: masterKey,
      encrypted: false,
    });
    await this.persist('host', undefined, secrets);

    this.logger.info({ result }, 'Master key set');
    return { secret: masterKey, result };
  }

  /**
   * @returns true when the key existed and was removed
   */
  async deleteSecret(secretName: string, keyScope: string, secretsType: ScriptSecretsType): Promise<boolean> {
    this.assertNotDisposed();
    assertSupportedType(secretsType);
    const scope = requireArgument(keyScope, 'keyScope').toLowerCase();
    let deleted = false;

    const persisted = await this.loadSecrets(secretsType, scope);
    if (persisted) {
      const keys = keysOf(persisted, scope);
      const index = keys ? findKeyIndex(keys, secretName) : -1;
      if (keys && index !== -1) {
        keys.splice(index, 1);
        await this.persist(secretsType, secretsType === 'host' ? undefined : scope, persisted);
        deleted = true;
      }
    }

    if (deleted) {
      const target = secretsType === 'function' ? `Function ('${scope}')` : `Host (scope: '${scope}')`;
      this.logger.info({ secretName }, `Deleted secret from ${target}`);
    }
    return deleted;
  }

  /**
   * Remove secrets of functions whose directory no longer exists under
   * the script root.
   */
  async purgeOldSecrets(rootScriptPath: string): Promise<void> {
    this.assertNotDisposed();
    // A missing root, or a path that is not a directory, has nothing to purge
    const entries = await fs.readdir(rootScriptPath, { withFileTypes: true }).catch((err: unknown) => {
      if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
        return undefined;
      }
      throw err;
    });
    if (!entries) {
      return;
    }

    const currentFunctions = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    await this.repository.purgeOldSecrets(currentFunctions, this.logger);
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.unsubscribe();
    await this.repository.dispose();
  }

  private onSecretsChanged(event: SecretsChangedEvent): void {
    if (event.type === 'host') {
      this.hostSecrets = undefined;
    } else if (event.name) {
      this.functionSecrets.delete(event.name.toLowerCase());
    }
  }

  private async modifySecrets(
    type: ScriptSecretsType,
    scope: string,
    change: (secrets: ScriptSecrets) => boolean
  ): Promise<void> {
    const secrets =
      (await this.loadSecrets(type, scope)) ??
      (type === 'host' ? this.generateHostSecrets() : { keys: [] });

    if (change(secrets)) {
      await this.persist(type, type === 'host' ? undefined : scope, secrets);
    }
  }

  private async loadSecrets(type: ScriptSecretsType, scope: string): Promise<ScriptSecrets | undefined> {
    const content = await this.repository.read(type, type === 'host' ? undefined : scope);
    return content ? deserializeSecrets(type, content) : undefined;
  }

  private async loadHostSecrets(): Promise<HostSecrets | undefined> {
    const content = await this.repository.read('host');
    return content ? deserializeHostSecrets(content) : undefined;
  }

  private async loadFunctionSecrets(functionName: string): Promise<FunctionSecrets | undefined> {
    const content = await this.repository.read('function', functionName);
    return content ? deserializeFunctionSecrets(content) : undefined;
  }

  private readHostSecrets(secrets: HostSecrets): HostSecrets {
    return {
      ...secrets,
      masterKey: this.converter.readKey(secrets.masterKey),
      functionKeys: secrets.functionKeys.map((key) => this.converter.readKey(key)),
      systemKeys: secrets.systemKeys.map((key) => this.converter.readKey(key)),
    };
  }

  private generateHostSecrets(): HostSecrets {
    return {
      masterKey: this.generateKey(SCRIPT_CONSTANTS.DEFAULT_MASTER_KEY_NAME),
      functionKeys: [this.generateKey(SCRIPT_CONSTANTS.DEFAULT_FUNCTION_KEY_NAME)],
      systemKeys: [],
    };
  }

  private generateFunctionSecrets(): FunctionSecrets {
    return { keys: [this.generateKey(SCRIPT_CONSTANTS.DEFAULT_FUNCTION_KEY_NAME)] };
  }

  private generateKey(name: string): Key {
    return this.converter.writeKey({ name, value: generateSecret(), encrypted: false });
  }

  /**
   * Write plaintext secrets back through the current converter.
   */
  private async refresh(type: ScriptSecretsType, scope: string | undefined, secrets: ScriptSecrets): Promise<void> {
    const write = (key: Key): Key => this.converter.writeKey(key);
    const refreshed: ScriptSecrets = isHostSecrets(secrets)
      ? {
          ...secrets,
          masterKey: write(secrets.masterKey),
          functionKeys: secrets.functionKeys.map(write),
          systemKeys: secrets.systemKeys.map(write),
        }
      : { ...secrets, keys: secrets.keys.map(write) };
    await this.persist(type, scope, refreshed);
  }

  private async persist(
    type: ScriptSecretsType,
    scope: string | undefined,
    secrets: ScriptSecrets,
    nonDecryptable = false
  ): Promise<void> {
    secrets.hostName = this.hostName;
    const content = serializeSecrets(secrets);

    if (!nonDecryptable) {
      await this.repository.write(type, scope, content);
      return;
    }

    const snapshots = await this.repository.getSecretSnapshots(type, scope);
    if (snapshots.length >= SCRIPT_CONSTANTS.MAX_SECRET_BACKUP_COUNT) {
      const analysis = await this.analyzeSnapshots(type, snapshots);
      const message =
        `Repository has more than ${SCRIPT_CONSTANTS.MAX_SECRET_BACKUP_COUNT} non-decryptable secrets backups ` +
        `(${scope ?? 'host'}).${analysis ? ` ${analysis}` : ''}`;
      this.logger.info(message);
      throw new HostError(ERROR_CODES.E_SECRETS_TOO_MANY_BACKUPS, message);
    }
    await this.repository.writeSnapshot(type, scope, content);
  }

  /**
   * Names the hosts that wrote the snapshots when there is more than one.
   */
  private async analyzeSnapshots(type: ScriptSecretsType, snapshots: readonly string[]): Promise<string> {
    try {
      const hosts = new Set<string>();
      for (const id of snapshots) {
        const content = await this.repository.readSnapshot(id);
        const hostName = content ? deserializeSecrets(type, content).hostName : undefined;
        if (hostName) {
          hosts.add(hostName);
        }
      }
      return hosts.size > 1
        ? `Hosts ${[...hosts].join(',')} are sharing the same secrets storage with different encryption keys.`
        : '';
    } catch (err) {
      this.logger.debug({ err }, 'Could not analyze secrets snapshots');
      return '';
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new HostError(ERROR_CODES.E_DISPOSED, 'The secret manager has been disposed');
    }
  }
}

function allHostKeys(secrets: HostSecrets): Key[] {
  return [secrets.masterKey, ...secrets.functionKeys, ...secrets.systemKeys];
}

function hasStaleKeys(keys: readonly Key[]): boolean {
  return keys.some((key) => key.stale === true);
}

/**
 * Replace every encrypted key with a new plaintext secret; plaintext keys
 * are kept.
 */
function regenerateKeys(keys: readonly Key[]): Key[] {
  return keys.map((key) => (key.encrypted ? { name: key.name, value: generateSecret(), encrypted: false } : { ...key }));
}

function regenerateHostSecrets(secrets: HostSecrets): HostSecrets {
  const [masterKey] = regenerateKeys([secrets.masterKey]);
  return {
    ...secrets,
    masterKey,
    functionKeys: regenerateKeys(secrets.functionKeys),
    systemKeys: regenerateKeys(secrets.systemKeys),
  };
}

function keysOf(secrets: ScriptSecrets, scope: string): Key[] | undefined {
  if (!isHostSecrets(secrets)) {
    return secrets.keys;
  }
  if (scope === HOST_KEY_SCOPES.FUNCTION_KEYS) {
    return secrets.functionKeys;
  }
  if (scope === HOST_KEY_SCOPES.SYSTEM_KEYS) {
    return secrets.systemKeys;
  }
  return undefined;
}

function findKeyIndex(keys: readonly Key[], name: string): number {
  const lower = name.toLowerCase();
  return keys.findIndex((key) => key.name.toLowerCase() === lower);
}

function assertSupportedType(type: string): void {
  if (type !== 'host' && type !== 'function') {
    throw new HostError(ERROR_CODES.E_SECRETS_TYPE_UNSUPPORTED, `Secrets type '${type}' is not supported`);
  }
}

function toRecord(keys: readonly Key[]): Record<string, string> {
  return Object.fromEntries(keys.map((key) => [key.name, key.value]));
}
