import * as path from 'path';
import { ENVIRONMENT_SETTING_NAMES, HostError, ERROR_CODES, SCRIPT_CONSTANTS } from '@fnhost/kernel';
import { parseCommaSeparated } from '@fnhost/config';
import type { LoggerFactory } from '@fnhost/logging';
import { createKeyValueConverterFactory } from './converters.js';
import { FileSystemSecretsRepository } from './file-repository.js';
import { InMemorySecretsRepository, type SecretsRepository } from './repository.js';
import { SecretManager } from './secret-manager.js';

export type SecretStorageType = 'files' | 'memory';

export interface SecretManagerSettings {
  storageType: SecretStorageType;
  secretsPath: string;
  encryptionKey?: string;
  previousEncryptionKeys: string[];
  hostName?: string;
  /** Watch the secrets directory for changes made by other hosts */
  watch: boolean;
}

/**
 * Read secret manager settings from the environment.
 *
 * @throws HostError E_CONFIG_INVALID for an unknown storage type
 */
export function readSecretManagerSettings(
  environment: Record<string, string | undefined>,
  rootScriptPath: string = process.cwd()
): SecretManagerSettings {
  const storage = (environment[ENVIRONMENT_SETTING_NAMES.SECRET_STORAGE_TYPE] ?? 'files').trim().toLowerCase();
  if (storage !== 'files' && storage !== 'memory') {
    throw new HostError(ERROR_CODES.E_CONFIG_INVALID, `Unsupported secret storage type '${storage}'`);
  }

  return {
    storageType: storage,
    secretsPath:
      environment[ENVIRONMENT_SETTING_NAMES.SECRETS_PATH] ?? path.join(rootScriptPath, '..', 'data', 'functions', 'secrets'),
    encryptionKey: environment[ENVIRONMENT_SETTING_NAMES.AUTH_ENCRYPTION_KEY] || undefined,
    previousEncryptionKeys: parseCommaSeparated(environment[ENVIRONMENT_SETTING_NAMES.PREVIOUS_ENCRYPTION_KEYS]),
    hostName: environment[ENVIRONMENT_SETTING_NAMES.WEBSITE_HOSTNAME],
    watch: storage === 'files',
  };
}

export interface SecretManagerFactory {
  create(settings: SecretManagerSettings, loggerFactory: LoggerFactory, repository?: SecretsRepository): SecretManager;
}

/**
 * Picks the repository and key converter from settings
 */
export class DefaultSecretManagerFactory implements SecretManagerFactory {
  create(settings: SecretManagerSettings, loggerFactory: LoggerFactory, repository?: SecretsRepository): SecretManager {
    return new SecretManager({
      repository: repository ?? createRepository(settings),
      converter: createKeyValueConverterFactory(settings),
      logger: loggerFactory.createLogger(SCRIPT_CONSTANTS.LOG_CATEGORY_KEYS),
      hostName: settings.hostName,
    });
  }
}

function createRepository(settings: SecretManagerSettings): SecretsRepository {
  if (settings.storageType === 'memory') {
    return new InMemorySecretsRepository();
  }
  return new FileSystemSecretsRepository(settings.secretsPath, { watch: settings.watch });
}
