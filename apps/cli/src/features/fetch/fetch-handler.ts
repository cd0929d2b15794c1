import { mkdir, writeFile } from 'node:fs/promises';

import { HttpClient } from '@refdata/http';
import { getErrorMessage, segmentDocumentSchema, type SegmentConfig, type SegmentId } from '@refdata/instruments';
import { getLogger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import type { CliEnv } from '../../env.js';
import type { CommandHandler } from '../shared/command-execution.js';
import { segmentDocumentPath } from '../shared/work-dir.js';

import { FETCH_ORDER, sourceUrl, type FetchHandlerParams } from './fetch-utils.js';

const logger = getLogger('FetchHandler');

/**
 * The slice of HttpClient the fetch step uses.
 */
export interface DocumentClient {
  get(endpoint: string, options: { schema: ZodType<unknown, ZodTypeDef, unknown> }): Promise<Result<unknown, Error>>;
  close(): Promise<void>;
}

export type DocumentClientFactory = (segment: SegmentConfig) => DocumentClient;

export function createHttpClientFactory(
  env: Pick<CliEnv, 'REFDATA_HTTP_TIMEOUT_MS' | 'REFDATA_HTTP_RETRIES'>
): DocumentClientFactory {
  return (segment) =>
    new HttpClient({
      baseUrl: segment.source.baseUrl,
      providerName: segment.venue,
      retries: env.REFDATA_HTTP_RETRIES,
      timeout: env.REFDATA_HTTP_TIMEOUT_MS,
    });
}

export interface FetchedDocument {
  segment: SegmentId;
  url: string;
  path: string;
}

export interface FetchResult {
  documents: FetchedDocument[];
}

/**
 * Downloads each segment's exchange info into the working directory,
 * validating it against the segment's document schema first.
 * Stops at the first failed request; documents already written stay on disk.
 */
export class FetchHandler implements CommandHandler<FetchHandlerParams, FetchResult> {
  private readonly clients: DocumentClient[] = [];

  constructor(private readonly createClient: DocumentClientFactory) {}

  async execute(params: FetchHandlerParams): Promise<Result<FetchResult, Error>> {
    try {
      await mkdir(params.dir, { recursive: true });
    } catch (error) {
      return err(new Error(`failed to create directory '${params.dir}': ${getErrorMessage(error)}`, { cause: error }));
    }

    const documents: FetchedDocument[] = [];

    for (const segment of FETCH_ORDER) {
      const client = this.createClient(segment);
      this.clients.push(client);

      const body = await client.get(segment.source.path, { schema: segmentDocumentSchema(segment) });
      if (body.isErr()) {
        return err(body.error);
      }

      const filePath = segmentDocumentPath(params.dir, segment);
      logger.info(`writing to file '${filePath}'`);
      try {
        await writeFile(filePath, JSON.stringify(body.value), 'utf8');
      } catch (error) {
        return err(new Error(`failed to write '${filePath}': ${getErrorMessage(error)}`, { cause: error }));
      }

      documents.push({ segment: segment.id, url: sourceUrl(segment), path: filePath });
    }

    return ok({ documents });
  }

  async destroy(): Promise<void> {
    const clients = this.clients.splice(0);
    await Promise.all(clients.map((client) => client.close()));
  }
}
