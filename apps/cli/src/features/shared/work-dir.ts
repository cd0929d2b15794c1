import path from 'node:path';

import { ASSETS_FILE_NAME, SEGMENTS, type SegmentConfig } from '@refdata/instruments';
import { getLogger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CliEnv } from '../../env.js';

import { ConfigError } from './exit-codes.js';

const logger = getLogger('work-dir');

export function segmentDocumentPath(dir: string, segment: SegmentConfig): string {
  return path.join(dir, segment.fileName);
}

export function assetsCsvPath(dir: string): string {
  return path.join(dir, ASSETS_FILE_NAME);
}

/**
 * Every file a run writes into the working directory.
 */
export function generatedFiles(dir: string): string[] {
  return [...SEGMENTS.map((segment) => segmentDocumentPath(dir, segment)), assetsCsvPath(dir)];
}

/**
 * Resolve the install root.
 *
 * Priority:
 * 1. --home option
 * 2. REFDATA_HOME environment variable
 */
export function resolveInstallHome(
  home: string | undefined,
  env: Pick<CliEnv, 'REFDATA_HOME'>
): Result<string, ConfigError> {
  if (home !== undefined) return ok(home);
  if (env.REFDATA_HOME !== undefined) {
    logger.debug(`using REFDATA_HOME=${env.REFDATA_HOME}`);
    return ok(env.REFDATA_HOME);
  }
  return err(new ConfigError('install root not set: pass --home or set REFDATA_HOME'));
}
