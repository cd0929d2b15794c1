import path from 'node:path';

import { ConsoleSink, FileSink, getLogger, initLogger, type Logger, type Sink } from '@refdata/logger';

import type { CliEnv } from '../../env.js';

const SEPARATOR = '='.repeat(70);

export interface RunInfo {
  bin: string;
  args: readonly string[];
  cwd: string;
  pid: number;
  ppid: number;
}

export function currentRunInfo(): RunInfo {
  return {
    bin: path.basename(process.argv[1] ?? 'refdata'),
    args: process.argv.slice(2),
    cwd: process.cwd(),
    pid: process.pid,
    ppid: process.ppid,
  };
}

/**
 * Console sink on stderr (so --json output on stdout stays parseable), plus a
 * JSON-lines file sink when REFDATA_LOG_FILE is set.
 */
export function setupLogging(env: Pick<CliEnv, 'REFDATA_LOG_LEVEL' | 'REFDATA_LOG_FILE'>): void {
  const sinks: Sink[] = [new ConsoleSink({ color: process.stderr.isTTY === true, stream: 'stderr' })];
  if (env.REFDATA_LOG_FILE) {
    sinks.push(new FileSink({ path: env.REFDATA_LOG_FILE }));
  }
  initLogger({ level: env.REFDATA_LOG_LEVEL, sinks });
}

/**
 * Log who started this run, between separator lines.
 */
export function logRunPreamble(info: RunInfo = currentRunInfo(), logger: Logger = getLogger('cli')): void {
  logger.info(SEPARATOR);
  logger.info(`bin : ${info.bin}`);
  logger.info(`args: ${JSON.stringify(info.args)}`);
  logger.info(`cwd : ${info.cwd}`);
  logger.info(`pid : ${info.pid}`);
  logger.info(`ppid: ${info.ppid}`);
  logger.info(SEPARATOR);
}
