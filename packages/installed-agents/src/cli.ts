#!/usr/bin/env node

import { runCli } from './cli-commands';
import { readAgentEnv } from './env';
import { DockerEnvironment } from './environment';
import { createStderrLogger } from './logger';

const argv = process.argv.slice(2);

runCli(argv, {
  env: readAgentEnv(process.env),
  logger: createStderrLogger('installed-agents', { debug: argv.includes('--debug') }),
  stdout: (text) => process.stdout.write(text),
  createEnvironment: (container) => new DockerEnvironment({ container }),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`installed-agents: error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 2;
  }
);
