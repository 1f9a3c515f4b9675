import { describe, it, expect } from 'vitest';
import { CryptographicError, HostError } from '@fnhost/kernel';
import {
  EncryptedKeyValueConverterFactory,
  EncryptionKeyRing,
  PlaintextKeyValueConverterFactory,
  createKeyValueConverterFactory,
  parseEncryptionKey,
} from '../src/index.js';

const KEY_A = '0'.repeat(64);
const KEY_B = '1'.repeat(64);

describe('parseEncryptionKey', () => {
  it('accepts hex and base64 key material', () => {
    const hex = parseEncryptionKey(KEY_A);
    const base64 = parseEncryptionKey(Buffer.alloc(32).toString('base64'));

    expect(hex.material).toHaveLength(32);
    expect(base64.id).toBe(hex.id);
    expect(hex.id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('rejects material of the wrong size', () => {
    expect(() => parseEncryptionKey('test-secret')).toThrow(HostError);
  });
});

describe('EncryptionKeyRing', () => {
  it('decrypts with the key that encrypted the value', () => {
    const ring = EncryptionKeyRing.fromSettings(KEY_A);

    const value = ring.encrypt('test-secret');

    expect(value.startsWith(`v1.${ring.current.id}.`)).toBe(true);
    expect(ring.decrypt(value)).toEqual({ plaintext: 'test-secret', keyId: ring.current.id });
  });

  it('decrypts values written with a previous key', () => {
    const old = EncryptionKeyRing.fromSettings(KEY_A);
    const rotated = EncryptionKeyRing.fromSettings(KEY_B, [KEY_A]);

    expect(rotated.decrypt(old.encrypt('test-secret'))).toEqual({ plaintext: 'test-secret', keyId: old.current.id });
  });

  it('fails for unknown keys, tampering and malformed values', () => {
    const ring = EncryptionKeyRing.fromSettings(KEY_A);
    const other = EncryptionKeyRing.fromSettings(KEY_B);
    const value = ring.encrypt('test-secret');
    const parts = value.split('.');
    const tampered = [...parts.slice(0, 4), Buffer.from('tampered').toString('base64url')].join('.');

    expect(() => other.decrypt(value)).toThrow(CryptographicError);
    expect(() => ring.decrypt(tampered)).toThrow(CryptographicError);
    expect(() => ring.decrypt('not-encrypted')).toThrow('Unrecognized encrypted value format');
  });
});

describe('key value converters', () => {
  it('passes plaintext keys through', () => {
    const converter = new PlaintextKeyValueConverterFactory();

    expect(converter.writeKey({ name: 'default', value: 'test-secret', encrypted: false })).toEqual({
      name: 'default',
      value: 'test-secret',
      encrypted: false,
    });
    expect(converter.readKey({ name: 'default', value: 'test-secret', encrypted: false })).toEqual({
      name: 'default',
      value: 'test-secret',
      encrypted: false,
      stale: false,
    });
  });

  it('cannot read encrypted keys without an encryption key', () => {
    const encrypted = new EncryptedKeyValueConverterFactory(EncryptionKeyRing.fromSettings(KEY_A)).writeKey({
      name: 'default',
      value: 'test-secret',
      encrypted: false,
    });

    expect(() => new PlaintextKeyValueConverterFactory().readKey(encrypted)).toThrow(CryptographicError);
  });

  it('marks plaintext and previous-key values as stale', () => {
    const old = new EncryptedKeyValueConverterFactory(EncryptionKeyRing.fromSettings(KEY_A));
    const current = new EncryptedKeyValueConverterFactory(EncryptionKeyRing.fromSettings(KEY_B, [KEY_A]));
    const written = old.writeKey({ name: 'default', value: 'test-secret', encrypted: false });

    expect(written.encrypted).toBe(true);
    expect(current.readKey(written)).toEqual({ name: 'default', value: 'test-secret', encrypted: false, stale: true });
    expect(current.readKey({ name: 'default', value: 'test-secret', encrypted: false }).stale).toBe(true);
    expect(old.readKey(written).stale).toBe(false);
  });

  it('picks the converter from settings', () => {
    expect(createKeyValueConverterFactory({}).encryptionEnabled).toBe(false);
    expect(createKeyValueConverterFactory({ encryptionKey: KEY_A }).encryptionEnabled).toBe(true);
  });
});
