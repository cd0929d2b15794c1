import type { Command } from 'commander';
import { err } from 'neverthrow';

import { createHttpClientFactory, FetchHandler } from '../fetch/fetch-handler.js';
import { InstallHandler } from '../install/install-handler.js';
import { ParseHandler } from '../parse/parse-handler.js';
import { runCommand } from '../shared/command-runtime.js';
import { GenerateCommandOptionsSchema } from '../shared/schemas.js';

import { GenerateHandler } from './generate-handler.js';
import { buildGenerateParamsFromFlags } from './generate-utils.js';

/**
 * Register the generate command.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Clear previous outputs, then fetch, parse and install the instrument CSV')
    .option('--dir <path>', 'Working directory', 'tmp')
    .option('--home <path>', 'Install root (default: REFDATA_HOME)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await runCommand({
        command: 'generate',
        schema: GenerateCommandOptionsSchema,
        rawOptions,
        execute: async (options, env) => {
          const params = buildGenerateParamsFromFlags(options, env);
          if (params.isErr()) {
            return err(params.error);
          }
          const handler = new GenerateHandler({
            fetch: new FetchHandler(createHttpClientFactory(env)),
            parse: new ParseHandler(),
            install: new InstallHandler(),
          });
          try {
            return await handler.execute(params.value);
          } finally {
            await handler.destroy();
          }
        },
        describe: (result) =>
          `Installed ${result.parse.instrumentCount} instruments to ${result.install.installedPath}`,
      });
    });
}
