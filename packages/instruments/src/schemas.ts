import { z } from 'zod';

import type { SegmentConfig } from './segments.js';

/**
 * Trading constraint values are copied verbatim: Binance sends quantities and
 * prices as decimal strings and order limits as integers. An explicit `null`
 * is kept and written as an empty cell; a missing key is a format error.
 */
export const ConstraintValueSchema = z.union([z.string(), z.number(), z.null()]);

/**
 * Exchange filter entry. Only `filterType` is common to all kinds; the
 * remaining fields depend on the tag and are read by the filter extractor.
 */
export const RawFilterSchema = z
  .object({
    filterType: z.string().min(1),
  })
  .passthrough();

const RawSymbolBaseSchema = z.object({
  symbol: z.string().min(1),
  baseAsset: z.string().min(1),
  quoteAsset: z.string().min(1),
  baseAssetPrecision: z.number().int(),
  filters: z.array(RawFilterSchema),
});

/** Symbol entry of GET /api/v3/exchangeInfo */
export const RawSpotSymbolSchema = RawSymbolBaseSchema.extend({
  quoteAssetPrecision: z.number().int(),
  status: z.string(),
}).passthrough();

/** Symbol entry of GET /fapi/v1/exchangeInfo and GET /dapi/v1/exchangeInfo */
export const RawDerivativeSymbolSchema = RawSymbolBaseSchema.extend({
  marginAsset: z.string().min(1),
  quotePrecision: z.number().int(),
  contractType: z.string().optional(),
  underlyingType: z.string().optional(),
  status: z.string().optional(), // USD-margined
  contractStatus: z.string().optional(), // coin-margined
}).passthrough();

export const SpotExchangeInfoSchema = z
  .object({
    symbols: z.array(RawSpotSymbolSchema),
  })
  .passthrough();

export const DerivativeExchangeInfoSchema = z
  .object({
    symbols: z.array(RawDerivativeSymbolSchema),
  })
  .passthrough();

/**
 * Schema of the exchange-info document a segment is downloaded and parsed as.
 */
export function segmentDocumentSchema(
  segment: SegmentConfig
): typeof SpotExchangeInfoSchema | typeof DerivativeExchangeInfoSchema {
  return segment.kind === 'spot' ? SpotExchangeInfoSchema : DerivativeExchangeInfoSchema;
}

export type ConstraintValue = z.infer<typeof ConstraintValueSchema>;
export type RawFilter = z.infer<typeof RawFilterSchema>;
export type RawSpotSymbol = z.infer<typeof RawSpotSymbolSchema>;
export type RawDerivativeSymbol = z.infer<typeof RawDerivativeSymbolSchema>;
export type SpotExchangeInfo = z.infer<typeof SpotExchangeInfoSchema>;
export type DerivativeExchangeInfo = z.infer<typeof DerivativeExchangeInfoSchema>;
