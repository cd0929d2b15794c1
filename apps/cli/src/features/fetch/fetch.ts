import type { Command } from 'commander';

import { runCommand } from '../shared/command-runtime.js';
import { FetchCommandOptionsSchema } from '../shared/schemas.js';

import { createHttpClientFactory, FetchHandler } from './fetch-handler.js';
import { buildFetchParamsFromFlags } from './fetch-utils.js';

/**
 * Register the fetch command.
 */
export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Download exchange info for every Binance segment')
    .option('--dir <path>', 'Directory to write the exchange documents to', 'tmp')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await runCommand({
        command: 'fetch',
        schema: FetchCommandOptionsSchema,
        rawOptions,
        execute: async (options, env) => {
          const handler = new FetchHandler(createHttpClientFactory(env));
          try {
            return await handler.execute(buildFetchParamsFromFlags(options));
          } finally {
            await handler.destroy();
          }
        },
        describe: (result) => `Fetched ${result.documents.length} exchange documents`,
      });
    });
}
