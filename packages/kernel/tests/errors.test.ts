import { describe, it, expect } from 'vitest';
import {
  ERROR_CODES,
  HostError,
  CryptographicError,
  requireArgument,
} from '../src/errors.js';

describe('HostError', () => {
  it('uses the catalog description when no message is given', () => {
    const err = new HostError(ERROR_CODES.E_DISPOSED);
    expect(err.message).toBe('The object has been disposed');
    expect(err.code).toBe('E_DISPOSED');
    expect(err.name).toBe('HostError');
    expect(err.retriable).toBe(false);
  });

  it('keeps the cause', () => {
    const cause = new Error('inner');
    const err = new HostError(ERROR_CODES.E_CONFIG_INVALID, 'bad section', { cause });
    expect(err.message).toBe('bad section');
    expect(err.cause).toBe(cause);
  });
});

describe('CryptographicError', () => {
  it('is a HostError with the decryption code', () => {
    const err = new CryptographicError('no key');
    expect(err).toBeInstanceOf(HostError);
    expect(err.code).toBe('E_SECRETS_DECRYPTION');
    expect(err.name).toBe('CryptographicError');
  });
});

describe('requireArgument', () => {
  it('returns present values', () => {
    expect(requireArgument('fn', 'functionName')).toBe('fn');
  });

  it('throws for empty strings and nullish values', () => {
    expect(() => requireArgument('', 'functionName')).toThrow("Argument 'functionName' is required");
    expect(() => requireArgument(undefined, 'x')).toThrow(HostError);
    expect(() => requireArgument(null, 'x')).toThrow(HostError);
  });
});
