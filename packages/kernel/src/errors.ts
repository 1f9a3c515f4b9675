/**
 * fnhost error codes and error classes
 */

import type { ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',
  E_ARGUMENT_REQUIRED: 'E_ARGUMENT_REQUIRED',
  E_FLAGS_COMPOSITE: 'E_FLAGS_COMPOSITE',
  E_SECRETS_DECRYPTION: 'E_SECRETS_DECRYPTION',
  E_SECRETS_TOO_MANY_BACKUPS: 'E_SECRETS_TOO_MANY_BACKUPS',
  E_SECRETS_TYPE_UNSUPPORTED: 'E_SECRETS_TYPE_UNSUPPORTED',
  E_SECRETS_INVALID_FORMAT: 'E_SECRETS_INVALID_FORMAT',
  E_SERVICE_NOT_REGISTERED: 'E_SERVICE_NOT_REGISTERED',
  E_DISPOSED: 'E_DISPOSED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_CONFIG_INVALID: {
    code: 'E_CONFIG_INVALID',
    title: 'Invalid Configuration',
    description: 'A configuration section could not be bound to its expected shape',
    retriable: false,
    category: 'configuration',
  },
  E_ARGUMENT_REQUIRED: {
    code: 'E_ARGUMENT_REQUIRED',
    title: 'Argument Required',
    description: 'A required argument was missing or empty',
    retriable: false,
    category: 'validation',
  },
  E_FLAGS_COMPOSITE: {
    code: 'E_FLAGS_COMPOSITE',
    title: 'Composite Flag',
    description: 'A flag dispatch table entry must name exactly one flag',
    retriable: false,
    category: 'validation',
  },
  E_SECRETS_DECRYPTION: {
    code: 'E_SECRETS_DECRYPTION',
    title: 'Secret Decryption Failed',
    description: 'A persisted secret could not be decrypted with any key in the key ring',
    retriable: false,
    category: 'secrets',
  },
  E_SECRETS_TOO_MANY_BACKUPS: {
    code: 'E_SECRETS_TOO_MANY_BACKUPS',
    title: 'Too Many Secret Backups',
    description: 'The maximum number of undecryptable secret snapshots has been reached',
    retriable: false,
    category: 'secrets',
  },
  E_SECRETS_TYPE_UNSUPPORTED: {
    code: 'E_SECRETS_TYPE_UNSUPPORTED',
    title: 'Secrets Type Not Supported',
    description: 'The requested secrets type is not supported by this operation',
    retriable: false,
    category: 'secrets',
  },
  E_SECRETS_INVALID_FORMAT: {
    code: 'E_SECRETS_INVALID_FORMAT',
    title: 'Invalid Secrets Format',
    description: 'Persisted secrets content does not match any known format',
    retriable: false,
    category: 'secrets',
  },
  E_SERVICE_NOT_REGISTERED: {
    code: 'E_SERVICE_NOT_REGISTERED',
    title: 'Service Not Registered',
    description: 'No registration exists for the requested service token',
    retriable: false,
    category: 'infrastructure',
  },
  E_DISPOSED: {
    code: 'E_DISPOSED',
    title: 'Disposed',
    description: 'The object has been disposed',
    retriable: false,
    category: 'infrastructure',
  },
};

/**
 * Host error with a canonical code.
 */
export class HostError extends Error {
  readonly code: ErrorCode;
  readonly retriable: boolean;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? ERRORS[code].description, options);
    this.name = 'HostError';
    this.code = code;
    this.retriable = ERRORS[code].retriable;
  }
}

/**
 * Raised when a persisted value cannot be decrypted with the current key ring.
 */
export class CryptographicError extends HostError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.E_SECRETS_DECRYPTION, message, options);
    this.name = 'CryptographicError';
  }
}

/**
 * Throw E_ARGUMENT_REQUIRED when value is undefined, null or empty.
 */
export function requireArgument<T>(value: T | null | undefined, name: string): T {
  if (value === undefined || value === null || value === '') {
    throw new HostError(ERROR_CODES.E_ARGUMENT_REQUIRED, `Argument '${name}' is required`);
  }
  return value;
}
