/**
 * Key value converters
 *
 * Encrypted values are AES-256-GCM, written as
 * `v1.<keyId>.<iv>.<authTag>.<ciphertext>` with base64url parts. The key
 * id lets a reader pick the right key from the ring after rotation.
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import { CryptographicError, HostError, ERROR_CODES } from '@fnhost/kernel';
import type { Key } from './types.js';

const FORMAT_VERSION = 'v1';
const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12;

export interface EncryptionKey {
  id: string;
  material: Buffer;
}

/**
 * Parse key material given as 64 hex characters or base64 of 32 bytes.
 *
 * @throws HostError E_CONFIG_INVALID for anything else
 */
export function parseEncryptionKey(value: string): EncryptionKey {
  const trimmed = value.trim();
  let material: Buffer | undefined;

  if (/^[0-9a-fA-F]{64}$/.test(trimmed)) {
    material = Buffer.from(trimmed, 'hex');
  } else {
    const decoded = Buffer.from(trimmed, 'base64');
    if (decoded.length === KEY_LENGTH) {
      material = decoded;
    }
  }

  if (!material) {
    throw new HostError(
      ERROR_CODES.E_CONFIG_INVALID,
      `Encryption keys must be ${KEY_LENGTH} bytes, given as hex or base64`
    );
  }

  return { id: createHash('sha256').update(material).digest('hex').slice(0, 16), material };
}

/**
 * The current encryption key plus keys it replaced
 */
export class EncryptionKeyRing {
  constructor(
    readonly current: EncryptionKey,
    readonly previous: readonly EncryptionKey[] = []
  ) {}

  static fromSettings(currentKey: string, previousKeys: readonly string[] = []): EncryptionKeyRing {
    return new EncryptionKeyRing(parseEncryptionKey(currentKey), previousKeys.map(parseEncryptionKey));
  }

  find(id: string): EncryptionKey | undefined {
    if (this.current.id === id) {
      return this.current;
    }
    return this.previous.find((key) => key.id === id);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.current.material, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [FORMAT_VERSION, this.current.id, iv.toString('base64url'), tag.toString('base64url'), ciphertext.toString('base64url')].join('.');
  }

  /**
   * @throws CryptographicError when the value is malformed, no ring key
   * matches its key id, or authentication fails
   */
  decrypt(value: string): { plaintext: string; keyId: string } {
    const parts = value.split('.');
    if (parts.length !== 5 || parts[0] !== FORMAT_VERSION) {
      throw new CryptographicError('Unrecognized encrypted value format');
    }

    const [, keyId, iv, tag, ciphertext] = parts;
    const key = this.find(keyId);
    if (!key) {
      throw new CryptographicError(`No key in the key ring matches key id '${keyId}'`);
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, key.material, Buffer.from(iv, 'base64url'));
      decipher.setAuthTag(Buffer.from(tag, 'base64url'));
      const plaintext = Buffer.concat([decipher.update(Buffer.from(ciphertext, 'base64url')), decipher.final()]);
      return { plaintext: plaintext.toString('utf8'), keyId };
    } catch (err) {
      throw new CryptographicError('Encrypted value failed authentication', { cause: err });
    }
  }
}

/**
 * Reads persisted keys into plaintext and writes plaintext keys into their
 * persisted form.
 */
export interface KeyValueConverterFactory {
  readonly encryptionEnabled: boolean;
  /** @throws CryptographicError when an encrypted key cannot be decrypted */
  readKey(key: Key): Key;
  writeKey(key: Key): Key;
}

export class PlaintextKeyValueConverterFactory implements KeyValueConverterFactory {
  readonly encryptionEnabled = false;

  readKey(key: Key): Key {
    if (key.encrypted) {
      throw new CryptographicError(`Key '${key.name}' is encrypted and no encryption key is configured`);
    }
    return { name: key.name, value: key.value, encrypted: false, stale: false };
  }

  writeKey(key: Key): Key {
    return { name: key.name, value: key.value, encrypted: false };
  }
}

export class EncryptedKeyValueConverterFactory implements KeyValueConverterFactory {
  readonly encryptionEnabled = true;

  constructor(private readonly keyRing: EncryptionKeyRing) {}

  readKey(key: Key): Key {
    if (!key.encrypted) {
      return { name: key.name, value: key.value, encrypted: false, stale: true };
    }
    const { plaintext, keyId } = this.keyRing.decrypt(key.value);
    return { name: key.name, value: plaintext, encrypted: false, stale: keyId !== this.keyRing.current.id };
  }

  writeKey(key: Key): Key {
    return { name: key.name, value: this.keyRing.encrypt(key.value), encrypted: true };
  }
}

export interface KeyValueConverterSettings {
  encryptionKey?: string;
  previousEncryptionKeys?: readonly string[];
}

export function createKeyValueConverterFactory(settings: KeyValueConverterSettings): KeyValueConverterFactory {
  if (!settings.encryptionKey) {
    return new PlaintextKeyValueConverterFactory();
  }
  return new EncryptedKeyValueConverterFactory(
    EncryptionKeyRing.fromSettings(settings.encryptionKey, settings.previousEncryptionKeys)
  );
}
