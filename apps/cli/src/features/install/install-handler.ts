import { copyFile, mkdir, rename, rm, symlink } from 'node:fs/promises';
import { dirname } from 'node:path';

import { getErrorMessage } from '@refdata/instruments';
import { getLogger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

import type { InstallHandlerParams } from './install-utils.js';

const logger = getLogger('InstallHandler');

export interface InstallResult {
  date: string;
  installedPath: string;
  latestLinkPath: string;
}

/**
 * Copies the generated CSV into the dated install location and repoints the
 * `assets-latest.csv` symlink at it.
 */
export class InstallHandler implements CommandHandler<InstallHandlerParams, InstallResult> {
  async execute(params: InstallHandlerParams): Promise<Result<InstallResult, Error>> {
    const { targetPath, latestLinkPath } = params.paths;

    logger.info(`installing '${params.inputPath}' to '${targetPath}'`);
    try {
      await mkdir(dirname(targetPath), { recursive: true });
      await copyFile(params.inputPath, targetPath);
    } catch (error) {
      return err(new Error(`failed to install '${params.inputPath}': ${getErrorMessage(error)}`, { cause: error }));
    }

    const linked = await replaceSymlink(targetPath, latestLinkPath);
    if (linked.isErr()) {
      return err(linked.error);
    }
    logger.info(`'${latestLinkPath}' -> '${targetPath}'`);

    return ok({ date: params.date, installedPath: targetPath, latestLinkPath });
  }

  destroy(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Point `linkPath` at `target`, replacing any existing link. The new link is
 * created beside the old one and renamed over it.
 */
async function replaceSymlink(target: string, linkPath: string): Promise<Result<void, Error>> {
  const tempPath = `${linkPath}.tmp-${process.pid}`;
  try {
    await rm(tempPath, { force: true });
    await symlink(target, tempPath);
    await rename(tempPath, linkPath);
    return ok(undefined);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(`failed to remove '${tempPath}': ${getErrorMessage(cleanupError)}`);
    });
    return err(new Error(`failed to link '${linkPath}': ${getErrorMessage(error)}`, { cause: error }));
  }
}
