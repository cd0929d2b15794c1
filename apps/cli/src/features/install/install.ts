import type { Command } from 'commander';
import { err } from 'neverthrow';

import { runCommand } from '../shared/command-runtime.js';
import { InstallCommandOptionsSchema } from '../shared/schemas.js';

import { InstallHandler } from './install-handler.js';
import { buildInstallParamsFromFlags } from './install-utils.js';

/**
 * Register the install command.
 */
export function registerInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Copy the instrument CSV into the dated install location and update assets-latest.csv')
    .option('--input <file>', 'Instrument CSV to install', 'tmp/binance_assets.csv')
    .option('--home <path>', 'Install root (default: REFDATA_HOME)')
    .option('--date <YYYYMMDD>', 'Install date (default: today)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await runCommand({
        command: 'install',
        schema: InstallCommandOptionsSchema,
        rawOptions,
        execute: async (options, env) => {
          const params = buildInstallParamsFromFlags(options, env);
          if (params.isErr()) {
            return err(params.error);
          }
          const handler = new InstallHandler();
          try {
            return await handler.execute(params.value);
          } finally {
            await handler.destroy();
          }
        },
        describe: (result) => `Installed ${result.installedPath}`,
      });
    });
}
