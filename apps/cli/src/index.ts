#!/usr/bin/env node
import { flushLoggers, getLogger } from '@refdata/logger';
import { Command } from 'commander';

import { registerFetchCommand } from './features/fetch/fetch.js';
import { registerGenerateCommand } from './features/generate/generate.js';
import { registerInstallCommand } from './features/install/install.js';
import { registerParseCommand } from './features/parse/parse.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('refdata')
    .description('Binance instrument reference data: download, normalize and install')
    .version('1.0.0');

  registerFetchCommand(program);
  registerParseCommand(program);
  registerInstallCommand(program);
  registerGenerateCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  flushLoggers();
  process.exit(1);
});
