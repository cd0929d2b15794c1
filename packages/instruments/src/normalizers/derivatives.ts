import { getLogger, type Logger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';

import { classifyContractType } from '../contract-type.js';
import type { DiagnosticSink } from '../diagnostics.js';
import type { FormatError } from '../errors.js';
import { buildDerivativeInstrumentId } from '../instrument-id.js';
import type { DerivativeExchangeInfo, RawDerivativeSymbol } from '../schemas.js';
import type { SegmentConfig } from '../segments.js';
import type { CanonicalInstrument } from '../types.js';

import { extractSymbolConstraints, logSegmentSummary } from './shared.js';

/**
 * USD-margined symbols report `status`, coin-margined ones `contractStatus`.
 */
export function resolveStatus(item: Pick<RawDerivativeSymbol, 'status' | 'contractStatus'>): string {
  return item.status ?? item.contractStatus ?? 'unknown';
}

/**
 * Futures exchange info (either margin segment) → perpetual and dated future
 * records. Symbols with a contract type outside the modeled set are skipped
 * with a diagnostic.
 */
export function normalizeDerivativeSymbols(
  document: DerivativeExchangeInfo,
  segment: SegmentConfig,
  diagnostics: DiagnosticSink,
  logger: Logger = getLogger(`normalizer:${segment.id}`)
): Result<CanonicalInstrument[], FormatError> {
  logSegmentSummary(logger, segment, document.symbols.length);

  const instruments: CanonicalInstrument[] = [];

  for (const item of document.symbols) {
    const classification = classifyContractType(item.contractType);
    if (!classification) {
      diagnostics.report({
        code: 'UNHANDLED_CONTRACT_TYPE',
        level: 'info',
        message: `skipping instrument '${item.symbol}': unhandled contract type '${item.contractType ?? ''}'`,
        context: { venue: segment.venue },
      });
      continue;
    }

    const instId = buildDerivativeInstrumentId({
      classification,
      symbol: item.symbol,
      baseAsset: item.baseAsset,
      quoteAsset: item.quoteAsset,
    });
    if (instId.isErr()) {
      return err(instId.error);
    }

    const constraints = extractSymbolConstraints(item.symbol, item.filters, segment, diagnostics);
    if (constraints.isErr()) {
      return err(constraints.error);
    }

    instruments.push({
      symbol: item.symbol,
      instId: instId.value,
      type: classification.assetType,
      venue: segment.venue,
      baseAsset: item.baseAsset,
      quoteAsset: item.quoteAsset,
      marginAsset: item.marginAsset,
      quoteAssetPrecision: item.quotePrecision,
      baseAssetPrecision: item.baseAssetPrecision,
      status: resolveStatus(item),
      ...(item.underlyingType !== undefined ? { underlyingType: item.underlyingType } : {}),
      ...(item.contractType !== undefined ? { contractType: item.contractType } : {}),
      ...constraints.value,
    });
  }

  return ok(instruments);
}
