import { getLogger, type Logger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import type { DiagnosticSink } from '../diagnostics.js';
import type { FormatError } from '../errors.js';
import { buildSpotInstrumentId } from '../instrument-id.js';
import type { SpotExchangeInfo } from '../schemas.js';
import type { SegmentConfig } from '../segments.js';
import type { CanonicalInstrument } from '../types.js';

import { extractSymbolConstraints, logSegmentSummary } from './shared.js';

/**
 * Spot exchange info → one `coinpair` record per symbol.
 */
export function normalizeSpotSymbols(
  document: SpotExchangeInfo,
  segment: SegmentConfig,
  diagnostics: DiagnosticSink,
  logger: Logger = getLogger('normalizer:spot')
): Result<CanonicalInstrument[], FormatError> {
  logSegmentSummary(logger, segment, document.symbols.length);

  const instruments: CanonicalInstrument[] = [];

  for (const item of document.symbols) {
    const constraints = extractSymbolConstraints(item.symbol, item.filters, segment, diagnostics);
    if (constraints.isErr()) {
      return err(constraints.error);
    }

    instruments.push({
      symbol: item.symbol,
      instId: buildSpotInstrumentId(item.baseAsset, item.quoteAsset),
      type: 'coinpair',
      venue: segment.venue,
      baseAsset: item.baseAsset,
      quoteAsset: item.quoteAsset,
      quoteAssetPrecision: item.quoteAssetPrecision,
      baseAssetPrecision: item.baseAssetPrecision,
      status: item.status,
      ...constraints.value,
    });
  }

  return ok(instruments);
}
