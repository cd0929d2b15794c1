import type { Logger } from '@refdata/logger';
import { err, type Result } from 'neverthrow';

import type { DiagnosticSink } from '../diagnostics.js';
import { FormatError } from '../errors.js';
import { extractFilterConstraints } from '../filters.js';
import type { RawFilter } from '../schemas.js';
import type { SegmentConfig } from '../segments.js';
import type { FilterConstraints } from '../types.js';

export function logSegmentSummary(logger: Logger, segment: SegmentConfig, symbolCount: number): void {
  logger.info(`file has ${symbolCount} symbols`);
  logger.info({ venue: segment.venue, ignored: [...segment.ignoredFilters] }, 'ignoring following filters');
}

/**
 * Filter extraction with the failing symbol named in the error.
 */
export function extractSymbolConstraints(
  symbol: string,
  filters: readonly RawFilter[],
  segment: SegmentConfig,
  diagnostics: DiagnosticSink
): Result<FilterConstraints, FormatError> {
  const result = extractFilterConstraints(filters, segment, diagnostics);
  if (result.isErr()) {
    return err(new FormatError(`symbol '${symbol}': ${result.error.message}`, result.error.input));
  }
  return result;
}
