import { ok, type Result } from 'neverthrow';

import type { ContractClassification } from './contract-type.js';
import type { FormatError } from './errors.js';
import { simplifyFutureCode } from './future-code.js';
import { VENUE_SUFFIX } from './types.js';

export interface DerivativeIdInput {
  classification: ContractClassification;
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
}

export function buildSpotInstrumentId(baseAsset: string, quoteAsset: string): string {
  return `${baseAsset}/${quoteAsset}.${VENUE_SUFFIX}`;
}

/**
 * Canonical id of a perpetual or dated future.
 *
 * Perpetuals become `<base>/<quote>.<short code>.BNC` (`.PF.`) whatever their
 * native suffix (`BTCUSDT`, `BTCUSD_PERP`). Dated futures encode their expiry
 * as `<base>/<quote>.<month code><year digit>.BNC`.
 */
export function buildDerivativeInstrumentId(input: DerivativeIdInput): Result<string, FormatError> {
  const { classification, symbol, baseAsset, quoteAsset } = input;
  const root = `${baseAsset}/${quoteAsset}`;

  if (classification.assetType === 'perp') {
    return ok(`${root}.${classification.shortCode}.${VENUE_SUFFIX}`);
  }

  return simplifyFutureCode(symbol).map((code) => `${root}.${code}.${VENUE_SUFFIX}`);
}
