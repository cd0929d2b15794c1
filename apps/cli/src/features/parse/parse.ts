import type { Command } from 'commander';

import { runCommand } from '../shared/command-runtime.js';
import { ParseCommandOptionsSchema } from '../shared/schemas.js';

import { ParseHandler } from './parse-handler.js';
import { buildParseParamsFromFlags } from './parse-utils.js';

/**
 * Register the parse command.
 */
export function registerParseCommand(program: Command): void {
  program
    .command('parse')
    .description('Normalize the downloaded exchange documents into the instrument CSV')
    .option('--dir <path>', 'Directory holding the exchange documents', 'tmp')
    .option('--output <file>', 'Output CSV path (default: <dir>/binance_assets.csv)')
    .option('--delimiter <char>', 'CSV field delimiter', ',')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await runCommand({
        command: 'parse',
        schema: ParseCommandOptionsSchema,
        rawOptions,
        execute: async (options) => {
          const handler = new ParseHandler();
          try {
            return await handler.execute(buildParseParamsFromFlags(options));
          } finally {
            await handler.destroy();
          }
        },
        describe: (result) => `Wrote ${result.instrumentCount} instruments to ${result.outputPath}`,
      });
    });
}
