#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { CLIError } from './helpers.js';
import { registerConfigCommands } from './config.js';
import { registerDebateCommand } from './debate.js';
import { registerBatchCommand } from './batch.js';

const pkg: { version?: unknown } = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
const version = typeof pkg.version === 'string' ? pkg.version : '0.0.0';

const program = new Command();
program.name('agora').description('Resource-bounded multi-agent cultural debate').version(version);

registerConfigCommands(program);
registerDebateCommand(program);
registerBatchCommand(program);

// Ensure clean exit after any command (pi-ai clients can keep sockets alive)
program.hook('postAction', () => {
  process.exit(0);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CLIError) {
    if (err.message) console.error(err.message);
    process.exit(err.exitCode);
  }
  throw err;
});
