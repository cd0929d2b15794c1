import { rm } from 'node:fs/promises';

import { getErrorMessage } from '@refdata/instruments';
import { getLogger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import type { FetchHandler, FetchResult } from '../fetch/fetch-handler.js';
import type { InstallHandler, InstallResult } from '../install/install-handler.js';
import type { ParseHandler, ParseResult } from '../parse/parse-handler.js';
import { buildParseParamsFromFlags } from '../parse/parse-utils.js';
import type { CommandHandler } from '../shared/command-execution.js';
import { generatedFiles } from '../shared/work-dir.js';

import type { GenerateHandlerParams } from './generate-utils.js';

const logger = getLogger('GenerateHandler');

export interface GenerateResult {
  removed: string[];
  fetch: FetchResult;
  parse: ParseResult;
  install: InstallResult;
}

export interface GenerateSteps {
  fetch: FetchHandler;
  parse: ParseHandler;
  install: InstallHandler;
}

/**
 * Full refresh: clear previous outputs, then fetch, parse and install.
 */
export class GenerateHandler implements CommandHandler<GenerateHandlerParams, GenerateResult> {
  constructor(private readonly steps: GenerateSteps) {}

  async execute(params: GenerateHandlerParams): Promise<Result<GenerateResult, Error>> {
    const removed = await clearGeneratedFiles(params.dir);
    if (removed.isErr()) {
      return err(removed.error);
    }

    const fetched = await this.steps.fetch.execute({ dir: params.dir });
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const parsed = await this.steps.parse.execute(buildParseParamsFromFlags({ dir: params.dir, delimiter: ',' }));
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const installed = await this.steps.install.execute(params.install);
    if (installed.isErr()) {
      return err(installed.error);
    }

    return ok({ removed: removed.value, fetch: fetched.value, parse: parsed.value, install: installed.value });
  }

  async destroy(): Promise<void> {
    await Promise.all([this.steps.fetch.destroy(), this.steps.parse.destroy(), this.steps.install.destroy()]);
  }
}

async function clearGeneratedFiles(dir: string): Promise<Result<string[], Error>> {
  const files = generatedFiles(dir);
  try {
    await Promise.all(files.map((file) => rm(file, { force: true })));
  } catch (error) {
    return err(new Error(`failed to clear '${dir}': ${getErrorMessage(error)}`, { cause: error }));
  }
  logger.info({ files }, 'removed previous outputs');
  return ok(files);
}
