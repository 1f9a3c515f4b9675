import { Command, Option } from 'clipanion';
import { resolve } from 'path';
import chalk from 'chalk';
import { HostError } from '@fnhost/kernel';
import { LoggerFactory } from '@fnhost/logging';
import { DefaultSecretManagerFactory, readSecretManagerSettings, type SecretManager } from '@fnhost/secrets';

/**
 * Commands working against a secrets directory. Encryption keys come from
 * the same environment variables the host reads.
 */
export abstract class SecretsCommand extends Command {
  secretsPath = Option.String('--secrets-path', './secrets', {
    description: 'Directory holding host.json and <function>.json secrets',
  });
  verbose = Option.Boolean('--verbose', false, { description: 'Log secret manager activity to stderr' });

  protected abstract run(manager: SecretManager): Promise<number>;

  async execute(): Promise<number> {
    let manager: SecretManager | undefined;
    try {
      manager = this.createSecretManager();
      return await this.run(manager);
    } catch (err) {
      if (err instanceof HostError) {
        this.context.stderr.write(chalk.red(`${err.code}: ${err.message}\n`));
        return 2;
      }
      throw err;
    } finally {
      await manager?.dispose();
    }
  }

  protected write(line: string): void {
    this.context.stdout.write(`${line}\n`);
  }

  private createSecretManager(): SecretManager {
    const loggerFactory = new LoggerFactory({
      level: this.verbose ? 'debug' : 'fatal',
      destination: this.context.stderr,
      name: 'fnhost-cli',
    });
    const settings = {
      ...readSecretManagerSettings(this.context.env),
      storageType: 'files' as const,
      secretsPath: resolve(this.secretsPath),
      watch: false,
    };
    return new DefaultSecretManagerFactory().create(settings, loggerFactory);
  }
}
