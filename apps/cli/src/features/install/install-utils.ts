import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import type { CliEnv } from '../../env.js';
import type { ConfigError } from '../shared/exit-codes.js';
import type { InstallCommandOptionsSchema } from '../shared/schemas.js';
import { resolveInstallHome } from '../shared/work-dir.js';

export type InstallCommandOptions = z.infer<typeof InstallCommandOptionsSchema>;

export const LATEST_LINK_NAME = 'assets-latest.csv';

export interface InstallPaths {
  /** `<home>/data/refdata/assets` */
  assetsDir: string;
  /** `<assetsDir>/<date>/assets-<date>.csv` */
  targetPath: string;
  /** `<assetsDir>/assets-latest.csv` */
  latestLinkPath: string;
}

export interface InstallHandlerParams {
  inputPath: string;
  date: string;
  paths: InstallPaths;
}

/**
 * Local calendar date as YYYYMMDD.
 */
export function formatInstallDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function buildInstallPaths(home: string, date: string): InstallPaths {
  const assetsDir = path.resolve(home, 'data', 'refdata', 'assets');
  return {
    assetsDir,
    targetPath: path.join(assetsDir, date, `assets-${date}.csv`),
    latestLinkPath: path.join(assetsDir, LATEST_LINK_NAME),
  };
}

/**
 * Build install parameters from validated CLI flags.
 * The install root comes from --home or REFDATA_HOME; the date defaults to today.
 */
export function buildInstallParamsFromFlags(
  options: Pick<InstallCommandOptions, 'input' | 'home' | 'date'>,
  env: Pick<CliEnv, 'REFDATA_HOME'>,
  now: Date = new Date()
): Result<InstallHandlerParams, ConfigError> {
  const home = resolveInstallHome(options.home, env);
  if (home.isErr()) {
    return err(home.error);
  }

  const date = options.date ?? formatInstallDate(now);
  return ok({
    inputPath: options.input,
    date,
    paths: buildInstallPaths(home.value, date),
  });
}
