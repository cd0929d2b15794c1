import type { ConstraintValue } from './schemas.js';

export type AssetType = 'coinpair' | 'perp' | 'future';

/** Suffix appended to every instrument id sourced from Binance */
export const VENUE_SUFFIX = 'BNC';

/**
 * Constraints read from a symbol's filter list. Each member is present only
 * when the corresponding filter was.
 */
export type FilterConstraints = {
  minQty?: ConstraintValue;
  maxQty?: ConstraintValue;
  lotQty?: ConstraintValue;
  minNotional?: ConstraintValue;
  tickSize?: ConstraintValue;
  maxNumOrders?: ConstraintValue;
};

/**
 * Canonical instrument record.
 *
 * Property insertion order is the CSV column order for the first record of
 * each shape, so builders set fields in the order declared here. Absent
 * optional members are never set to `undefined`.
 */
export type CanonicalInstrument = {
  symbol: string;
  instId: string;
  type: AssetType;
  venue: string;
  baseAsset: string;
  quoteAsset: string;
  marginAsset?: string;
  quoteAssetPrecision: number;
  baseAssetPrecision: number;
  status: string;
  underlyingType?: string;
  contractType?: string;
} & FilterConstraints;
