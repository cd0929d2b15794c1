import { getLogger, type Logger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { writeCsv } from './csv/csv-writer.js';
import { DiagnosticSink } from './diagnostics.js';
import { DocumentParseError, DocumentValidationError, getErrorMessage } from './errors.js';
import { normalizeDerivativeSymbols } from './normalizers/derivatives.js';
import { normalizeSpotSymbols } from './normalizers/spot.js';
import { DerivativeExchangeInfoSchema, SpotExchangeInfoSchema } from './schemas.js';
import type { SegmentConfig } from './segments.js';
import type { CanonicalInstrument } from './types.js';

/** Column every output row is keyed and sorted by */
export const INSTRUMENT_KEY_FIELD = 'instId';

export interface ParseSessionOptions {
  diagnostics?: DiagnosticSink | undefined;
  logger?: Logger | undefined;
}

/**
 * Decode a raw segment document. Malformed JSON is fatal for the run.
 */
export function parseDocumentText(text: string, source: string): Result<unknown, DocumentParseError> {
  try {
    const document: unknown = JSON.parse(text);
    return ok(document);
  } catch (error) {
    return err(
      new DocumentParseError(`failed to parse JSON document '${source}': ${getErrorMessage(error)}`, source, {
        cause: error,
      })
    );
  }
}

function validateDocument<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  document: unknown,
  source: string
): Result<T, DocumentValidationError> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issues = parsed.error.issues.map((issue) => ({ message: issue.message, path: issue.path.join('.') }));
  const summary = issues
    .slice(0, 5)
    .map((issue) => `${issue.path}: ${issue.message}`)
    .join('; ');
  return err(new DocumentValidationError(`invalid document '${source}': ${summary}`, source, issues));
}

/**
 * One parse run: normalizes segment documents in the order they are added,
 * accumulates the merged instrument list and owns the run's diagnostics
 * (including the warn-once set).
 */
export class ParseSession {
  readonly diagnostics: DiagnosticSink;
  private readonly logger: Logger;
  private readonly records: CanonicalInstrument[] = [];

  constructor(options: ParseSessionOptions = {}) {
    this.logger = options.logger ?? getLogger('parse');
    this.diagnostics = options.diagnostics ?? new DiagnosticSink(this.logger);
  }

  get instruments(): readonly CanonicalInstrument[] {
    return this.records;
  }

  /**
   * Validate and normalize one segment document, appending its records.
   *
   * @param source - file name or URL, used in messages
   * @returns number of records added
   */
  addSegment(segment: SegmentConfig, document: unknown, source: string = segment.fileName): Result<number, Error> {
    const normalized =
      segment.kind === 'spot'
        ? validateDocument(SpotExchangeInfoSchema, document, source).andThen((doc) =>
            normalizeSpotSymbols(doc, segment, this.diagnostics)
          )
        : validateDocument(DerivativeExchangeInfoSchema, document, source).andThen((doc) =>
            normalizeDerivativeSymbols(doc, segment, this.diagnostics)
          );

    if (normalized.isErr()) {
      return err(normalized.error);
    }

    this.records.push(...normalized.value);
    this.logger.info({ venue: segment.venue, added: normalized.value.length }, 'segment normalized');
    return ok(normalized.value.length);
  }

  /** Same as addSegment, starting from the document's JSON text. */
  addSegmentText(segment: SegmentConfig, text: string, source: string = segment.fileName): Result<number, Error> {
    return parseDocumentText(text, source).andThen((document) => this.addSegment(segment, document, source));
  }

  toCsv(delimiter = ','): string {
    return writeCsv(this.records, INSTRUMENT_KEY_FIELD, { delimiter, diagnostics: this.diagnostics });
  }

  /** Drop accumulated records and diagnostics so the session can run again. */
  reset(): void {
    this.records.length = 0;
    this.diagnostics.reset();
  }
}
