import { flushLoggers } from '@refdata/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'Run `refdata fetch` first, or point --dir at the directory holding the exchange documents.',
  RATE_LIMIT: 'The exchange rate limit was exceeded. Wait a few minutes and try again.',
  NETWORK_ERROR: 'Check connectivity to the exchange API, or raise REFDATA_HTTP_TIMEOUT_MS / REFDATA_HTTP_RETRIES.',
  CONFIG_ERROR: 'Check the REFDATA_* environment variables.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(
    private readonly format: OutputFormat = 'text',
    private readonly stdout: OutputStream = process.stdout,
    private readonly stderr: OutputStream = process.stderr
  ) {}

  /**
   * Output a success response (JSON mode only).
   */
  json<T>(command: string, data: T): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, { duration_ms: Date.now() - this.startTime });
      this.stdout.write(`${JSON.stringify(response, undefined, 2)}\n`);
    }
  }

  /**
   * Display a completion line (text mode only).
   */
  success(message: string): void {
    if (this.format === 'text') {
      this.stdout.write(`${pc.green('✓')} ${message}\n`);
    }
  }

  /**
   * Print the error, flush pending log entries and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the response
      this.stdout.write(`${JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2)}\n`);
    } else {
      this.stderr.write(`${pc.red('✗')} Error: ${error.message}\n`);
      const tip = ERROR_TIPS[errorCode];
      if (tip) {
        this.stderr.write(`${pc.dim(tip)}\n`);
      }
      if (process.env['NODE_ENV'] === 'development' && error.stack) {
        this.stderr.write(`\n${pc.dim(error.stack)}\n`);
      }
    }

    flushLoggers();
    process.exit(exitCode);
  }
}
