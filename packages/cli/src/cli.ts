import { Builtins, Cli } from 'clipanion';
import { HOST_VERSION } from '@fnhost/kernel';
import { KeysDeleteCommand, KeysListCommand, KeysSetCommand, MasterSetCommand } from './cmd/keys.js';

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: 'Functions host key management',
    binaryName: 'fnhost',
    binaryVersion: HOST_VERSION,
  });

  cli.register(KeysListCommand);
  cli.register(KeysSetCommand);
  cli.register(KeysDeleteCommand);
  cli.register(MasterSetCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
