#!/usr/bin/env node

import { createCli } from './cli.js';

createCli()
  .runExit(process.argv.slice(2))
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
