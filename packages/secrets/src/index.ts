/**
 * @fnhost/secrets - host and function key management
 *
 * Keys are generated on first use, persisted through a repository,
 * optionally encrypted with AES-256-GCM, and refreshed when the encryption
 * key rotates.
 */

export type {
  Key,
  HostSecrets,
  FunctionSecrets,
  ScriptSecrets,
  ScriptSecretsType,
  HostSecretsInfo,
  OperationResult,
  KeyOperationResult,
  SecretsChangedEvent,
  SecretsChangedListener,
} from './types.js';
export { isHostSecrets } from './types.js';

export {
  EncryptionKeyRing,
  EncryptedKeyValueConverterFactory,
  PlaintextKeyValueConverterFactory,
  createKeyValueConverterFactory,
  parseEncryptionKey,
  type EncryptionKey,
  type KeyValueConverterFactory,
  type KeyValueConverterSettings,
} from './converters.js';

export {
  serializeSecrets,
  deserializeSecrets,
  deserializeHostSecrets,
  deserializeFunctionSecrets,
} from './serializer.js';

export {
  BaseSecretsRepository,
  InMemorySecretsRepository,
  HOST_SCOPE_NAME,
  scopeName,
  snapshotTimestamp,
  type SecretsRepository,
} from './repository.js';
export { FileSystemSecretsRepository, type FileSystemSecretsRepositoryOptions } from './file-repository.js';
export { Semaphore } from './semaphore.js';
export { SecretManager, generateSecret, type SecretManagerOptions } from './secret-manager.js';
export {
  DefaultSecretManagerFactory,
  readSecretManagerSettings,
  type SecretManagerFactory,
  type SecretManagerSettings,
  type SecretStorageType,
} from './factory.js';
