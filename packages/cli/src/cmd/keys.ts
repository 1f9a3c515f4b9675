import { Command, Option } from 'clipanion';
import chalk from 'chalk';
import { HOST_KEY_SCOPES } from '@fnhost/kernel';
import type { SecretManager } from '@fnhost/secrets';
import { SecretsCommand } from './base.js';

const HOST_SCOPES: readonly string[] = Object.values(HOST_KEY_SCOPES);

abstract class KeyCommand extends SecretsCommand {
  functionName = Option.String('--function', { description: 'Function the key belongs to; host keys when omitted' });
  scope = Option.String('--scope', HOST_KEY_SCOPES.FUNCTION_KEYS, {
    description: `Host key scope (${HOST_SCOPES.join(' or ')}); ignored with --function`,
  });

  /**
   * @returns undefined after reporting an unknown scope
   */
  protected target(): { keyScope: string; secretsType: 'host' | 'function' } | undefined {
    if (this.functionName) {
      return { keyScope: this.functionName, secretsType: 'function' };
    }
    const keyScope = this.scope.toLowerCase();
    if (!HOST_SCOPES.includes(keyScope)) {
      this.context.stderr.write(chalk.red(`Unknown key scope '${this.scope}'. Use ${HOST_SCOPES.join(' or ')}\n`));
      return undefined;
    }
    return { keyScope, secretsType: 'host' };
  }
}

export class KeysListCommand extends SecretsCommand {
  static paths = [['keys', 'list']];

  static usage = Command.Usage({
    description: 'List host or function keys',
    examples: [
      ['List host keys', 'fnhost keys list --secrets-path ./secrets'],
      ['List keys of one function', 'fnhost keys list --function orders'],
    ],
  });

  functionName = Option.String('--function', { description: 'List keys of this function' });
  json = Option.Boolean('--json', false, { description: 'Print JSON' });

  protected async run(manager: SecretManager): Promise<number> {
    if (this.functionName) {
      const keys = await manager.getFunctionSecrets(this.functionName);
      if (this.json) {
        this.write(JSON.stringify(keys, null, 2));
      } else {
        for (const [name, value] of Object.entries(keys)) {
          this.write(`${chalk.bold(name)}  ${value}`);
        }
      }
      return 0;
    }

    const host = await manager.getHostSecrets();
    if (this.json) {
      this.write(JSON.stringify(host, null, 2));
      return 0;
    }
    this.write(`${chalk.bold('master')}  ${host.masterKey}`);
    for (const [name, value] of Object.entries(host.functionKeys)) {
      this.write(`${chalk.bold(`${HOST_KEY_SCOPES.FUNCTION_KEYS}/${name}`)}  ${value}`);
    }
    for (const [name, value] of Object.entries(host.systemKeys)) {
      this.write(`${chalk.bold(`${HOST_KEY_SCOPES.SYSTEM_KEYS}/${name}`)}  ${value}`);
    }
    return 0;
  }
}

export class KeysSetCommand extends KeyCommand {
  static paths = [['keys', 'set']];

  static usage = Command.Usage({
    description: 'Create or update a key',
    details: 'A random value is generated unless --value is given.',
    examples: [
      ['Add a host function key', 'fnhost keys set partner'],
      ['Set a system key', 'fnhost keys set durabletask_extension --scope systemkeys'],
      ['Set a function key', 'fnhost keys set default --function orders --value test-secret'],
    ],
  });

  name = Option.String({ required: true });
  value = Option.String('--value', { description: 'Key value' });

  protected async run(manager: SecretManager): Promise<number> {
    const target = this.target();
    if (!target) {
      return 1;
    }

    const { secret, result } = await manager.addOrUpdateFunctionSecret(
      this.name,
      this.value,
      target.keyScope,
      target.secretsType
    );
    if (result === 'notFound') {
      this.context.stderr.write(chalk.red(`Key scope '${target.keyScope}' not found\n`));
      return 1;
    }

    this.write(`${chalk.green(result)} ${this.name}  ${secret}`);
    return 0;
  }
}

export class KeysDeleteCommand extends KeyCommand {
  static paths = [['keys', 'delete']];

  static usage = Command.Usage({
    description: 'Delete a key',
    examples: [
      ['Delete a host function key', 'fnhost keys delete partner'],
      ['Delete a function key', 'fnhost keys delete default --function orders'],
    ],
  });

  name = Option.String({ required: true });

  protected async run(manager: SecretManager): Promise<number> {
    const target = this.target();
    if (!target) {
      return 1;
    }

    const deleted = await manager.deleteSecret(this.name, target.keyScope, target.secretsType);
    if (!deleted) {
      this.context.stderr.write(chalk.yellow(`Key '${this.name}' not found in ${target.keyScope}\n`));
      return 1;
    }

    this.write(`${chalk.green('deleted')} ${this.name}`);
    return 0;
  }
}

export class MasterSetCommand extends SecretsCommand {
  static paths = [['master', 'set']];

  static usage = Command.Usage({
    description: 'Replace the master key',
    examples: [
      ['Generate a new master key', 'fnhost master set'],
      ['Use a given value', 'fnhost master set --value test-master'],
    ],
  });

  value = Option.String('--value', { description: 'Master key value' });

  protected async run(manager: SecretManager): Promise<number> {
    const { secret, result } = await manager.setMasterKey(this.value);
    this.write(`${chalk.green(result)} master  ${secret}`);
    return 0;
  }
}
