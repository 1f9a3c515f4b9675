/**
 * Secret types
 *
 * Persisted secrets hold keys as written by the active converter (possibly
 * encrypted). Keys returned to callers are always plaintext.
 */

export type ScriptSecretsType = 'host' | 'function';

export interface Key {
  name: string;
  value: string;
  /** Value is ciphertext */
  encrypted: boolean;
  /** Set on read when the persisted form no longer matches the current writer */
  stale?: boolean;
}

export interface HostSecrets {
  masterKey: Key;
  functionKeys: Key[];
  systemKeys: Key[];
  /** Host that last wrote the secrets */
  hostName?: string;
}

export interface FunctionSecrets {
  keys: Key[];
  hostName?: string;
}

export type ScriptSecrets = HostSecrets | FunctionSecrets;

/**
 * Plaintext host keys by name
 */
export interface HostSecretsInfo {
  masterKey: string;
  functionKeys: Record<string, string>;
  systemKeys: Record<string, string>;
}

export type OperationResult = 'created' | 'updated' | 'notFound' | 'conflict';

export interface KeyOperationResult {
  secret: string;
  result: OperationResult;
}

export interface SecretsChangedEvent {
  type: ScriptSecretsType;
  /** Function name for function secrets */
  name?: string;
}

export type SecretsChangedListener = (event: SecretsChangedEvent) => void;

export function isHostSecrets(secrets: ScriptSecrets): secrets is HostSecrets {
  return 'masterKey' in secrets;
}
