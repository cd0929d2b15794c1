import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { getErrorMessage, ParseSession, SEGMENTS, type DiagnosticCode } from '@refdata/instruments';
import { getLogger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import { segmentDocumentPath } from '../shared/work-dir.js';

import type { ParseHandlerParams } from './parse-utils.js';

const logger = getLogger('ParseHandler');

export interface ParseResult {
  instrumentCount: number;
  outputPath: string;
  diagnostics: Record<DiagnosticCode, number>;
}

async function readDocument(filePath: string): Promise<Result<string, Error>> {
  try {
    return ok(await readFile(filePath, 'utf8'));
  } catch (error) {
    return err(new Error(`failed to read '${filePath}': ${getErrorMessage(error)}`, { cause: error }));
  }
}

/**
 * Normalizes the three segment documents in merge order and writes the
 * instrument CSV. Any fatal error aborts before the output file is touched.
 */
export class ParseHandler implements CommandHandler<ParseHandlerParams, ParseResult> {
  constructor(private readonly session: ParseSession = new ParseSession()) {}

  async execute(params: ParseHandlerParams): Promise<Result<ParseResult, Error>> {
    this.session.reset();

    for (const segment of SEGMENTS) {
      const filePath = segmentDocumentPath(params.dir, segment);
      logger.info(`reading file '${filePath}'`);

      const text = await readDocument(filePath);
      if (text.isErr()) {
        return err(text.error);
      }

      const added = this.session.addSegmentText(segment, text.value, filePath);
      if (added.isErr()) {
        return err(added.error);
      }
    }

    const csv = this.session.toCsv(params.delimiter);

    logger.info(`writing to file '${params.outputPath}'`);
    try {
      await mkdir(dirname(params.outputPath), { recursive: true });
      await writeFile(params.outputPath, csv, 'utf8');
    } catch (error) {
      return err(new Error(`failed to write '${params.outputPath}': ${getErrorMessage(error)}`, { cause: error }));
    }

    const { diagnostics } = this.session;
    return ok({
      instrumentCount: this.session.instruments.length,
      outputPath: params.outputPath,
      diagnostics: {
        UNHANDLED_CONTRACT_TYPE: diagnostics.count('UNHANDLED_CONTRACT_TYPE'),
        UNRECOGNIZED_FILTER: diagnostics.count('UNRECOGNIZED_FILTER'),
        DUPLICATE_KEY: diagnostics.count('DUPLICATE_KEY'),
      },
    });
  }

  destroy(): Promise<void> {
    this.session.reset();
    return Promise.resolve();
  }
}
