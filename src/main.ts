#!/usr/bin/env node
/**
 * contact-book CLI
 */

import { config as loadEnv } from 'dotenv';
import { createProgram } from './cli/program.js';
import { runRepl } from './cli/repl.js';
import { createRouter } from './commands/router.js';
import { createContainer } from './container.js';

// Load environment variables from .env (fallback)
loadEnv();

const program = createProgram(async (config) => {
  const container = createContainer(config);
  container.logProvider.info('Contact book started', { pageSize: config.pageSize });

  await runRepl({
    input: process.stdin,
    output: process.stdout,
    dispatch: createRouter(container),
  });

  await container.logProvider.flush();
});

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
