/**
 * Secrets serialization
 *
 * Current format:
 *
 * ```json
 * { "masterKey": { "name": "master", "value": "...", "encrypted": false },
 *   "functionKeys": [...], "systemKeys": [...], "hostName": "..." }
 * { "keys": [...], "hostName": "..." }
 * ```
 *
 * Older hosts wrote `{ "masterKey": "...", "functionKey": "..." }` and
 * `{ "key": "..." }`; both are still read.
 */

import { z } from 'zod';
import { HostError, ERROR_CODES, SCRIPT_CONSTANTS } from '@fnhost/kernel';
import type { FunctionSecrets, HostSecrets, Key, ScriptSecrets, ScriptSecretsType } from './types.js';

const keySchema = z.object({
  name: z.string(),
  value: z.string(),
  encrypted: z.boolean().default(false),
});

const hostSecretsSchema = z.object({
  masterKey: keySchema,
  functionKeys: z.array(keySchema).default([]),
  systemKeys: z.array(keySchema).default([]),
  hostName: z.string().optional(),
});

const functionSecretsSchema = z.object({
  keys: z.array(keySchema),
  hostName: z.string().optional(),
});

const legacyHostSecretsSchema = z.object({
  masterKey: z.string(),
  functionKey: z.string(),
});

const legacyFunctionSecretsSchema = z.object({
  key: z.string(),
});

export function serializeSecrets(secrets: ScriptSecrets): string {
  const persisted =
    'masterKey' in secrets
      ? {
          masterKey: persistedKey(secrets.masterKey),
          functionKeys: secrets.functionKeys.map(persistedKey),
          systemKeys: secrets.systemKeys.map(persistedKey),
          hostName: secrets.hostName,
        }
      : { keys: secrets.keys.map(persistedKey), hostName: secrets.hostName };
  return JSON.stringify(persisted, null, 2);
}

export function deserializeHostSecrets(content: string): HostSecrets {
  const document = parseJson(content);

  const current = hostSecretsSchema.safeParse(document);
  if (current.success) {
    return current.data;
  }

  const legacy = legacyHostSecretsSchema.safeParse(document);
  if (legacy.success) {
    return {
      masterKey: plainKey(SCRIPT_CONSTANTS.DEFAULT_MASTER_KEY_NAME, legacy.data.masterKey),
      functionKeys: [plainKey(SCRIPT_CONSTANTS.DEFAULT_FUNCTION_KEY_NAME, legacy.data.functionKey)],
      systemKeys: [],
    };
  }

  throw new HostError(ERROR_CODES.E_SECRETS_INVALID_FORMAT, 'Host secrets do not match a known format');
}

export function deserializeFunctionSecrets(content: string): FunctionSecrets {
  const document = parseJson(content);

  const current = functionSecretsSchema.safeParse(document);
  if (current.success) {
    return current.data;
  }

  const legacy = legacyFunctionSecretsSchema.safeParse(document);
  if (legacy.success) {
    return { keys: [plainKey(SCRIPT_CONSTANTS.DEFAULT_FUNCTION_KEY_NAME, legacy.data.key)] };
  }

  throw new HostError(ERROR_CODES.E_SECRETS_INVALID_FORMAT, 'Function secrets do not match a known format');
}

export function deserializeSecrets(type: ScriptSecretsType, content: string): ScriptSecrets {
  return type === 'host' ? deserializeHostSecrets(content) : deserializeFunctionSecrets(content);
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new HostError(ERROR_CODES.E_SECRETS_INVALID_FORMAT, 'Secrets content is not valid JSON', { cause: err });
  }
}

function persistedKey(key: Key): Key {
  return { name: key.name, value: key.value, encrypted: key.encrypted };
}

function plainKey(name: string, value: string): Key {
  return { name, value, encrypted: false };
}
