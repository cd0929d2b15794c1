import type { Result } from 'neverthrow';
import type { z } from 'zod';

import type { CliEnv } from '../../env.js';
import { buildInstallParamsFromFlags, type InstallHandlerParams } from '../install/install-utils.js';
import type { ConfigError } from '../shared/exit-codes.js';
import type { GenerateCommandOptionsSchema } from '../shared/schemas.js';
import { assetsCsvPath } from '../shared/work-dir.js';

export type GenerateCommandOptions = z.infer<typeof GenerateCommandOptionsSchema>;

export interface GenerateHandlerParams {
  dir: string;
  install: InstallHandlerParams;
}

/**
 * Resolve every step's parameters up front so configuration errors surface
 * before anything is deleted or downloaded.
 */
export function buildGenerateParamsFromFlags(
  options: GenerateCommandOptions,
  env: Pick<CliEnv, 'REFDATA_HOME'>,
  now: Date = new Date()
): Result<GenerateHandlerParams, ConfigError> {
  return buildInstallParamsFromFlags({ input: assetsCsvPath(options.dir), home: options.home }, env, now).map(
    (install) => ({ dir: options.dir, install })
  );
}
