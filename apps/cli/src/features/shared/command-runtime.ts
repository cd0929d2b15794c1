import { flushLoggers } from '@refdata/logger';
import type { Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { getEnv, type CliEnv } from '../../env.js';

import { ExitCodes, exitCodeForError } from './exit-codes.js';
import { logRunPreamble, setupLogging } from './logging.js';
import { OutputManager } from './output.js';

export interface CommandRunConfig<TOptions, TResult> {
  command: string;
  schema: ZodType<TOptions, ZodTypeDef, unknown>;
  rawOptions: unknown;
  execute: (options: TOptions, env: CliEnv) => Promise<Result<TResult, Error>>;
  /** Text-mode summary of a successful run */
  describe: (result: TResult) => string;
}

/**
 * Shared command lifecycle: validate options at the CLI boundary, validate
 * the environment, configure logging, run, then report in text or JSON.
 * Failures exit through OutputManager.error with a semantic exit code.
 */
export async function runCommand<TOptions extends { json?: boolean | undefined }, TResult>(
  config: CommandRunConfig<TOptions, TResult>
): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof config.rawOptions === 'object' &&
    config.rawOptions !== null &&
    'json' in config.rawOptions &&
    config.rawOptions.json === true;

  const validationResult = config.schema.safeParse(config.rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    const message = firstError?.message ?? 'Invalid options';
    return output.error(config.command, new Error(message), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const envResult = getEnv();
  if (envResult.isErr()) {
    return output.error(config.command, envResult.error, ExitCodes.CONFIG_ERROR);
  }
  const env = envResult.value;

  setupLogging(env);
  logRunPreamble();

  let result: Result<TResult, Error>;
  try {
    result = await config.execute(options, env);
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    return output.error(config.command, failure, exitCodeForError(failure));
  }

  if (result.isErr()) {
    return output.error(config.command, result.error, exitCodeForError(result.error));
  }

  output.success(config.describe(result.value));
  output.json(config.command, result.value);
  flushLoggers();
}
