/**
 * @fnhost/cli - key management commands
 */

export { createCli } from './cli.js';
export { SecretsCommand } from './cmd/base.js';
export { KeysDeleteCommand, KeysListCommand, KeysSetCommand, MasterSetCommand } from './cmd/keys.js';
