export type SegmentId = 'spot' | 'usdfut' | 'coinfut';

export type SegmentKind = 'spot' | 'derivative';

/**
 * Field names the venue uses inside filters whose tag is shared across
 * segments but whose payload is not.
 */
export interface FilterFieldKeys {
  minNotional: string;
  maxNumOrders: string;
}

export interface SegmentConfig {
  id: SegmentId;
  kind: SegmentKind;
  /** `venue` column of every record built from this segment */
  venue: string;
  /** Filter tags dropped without a diagnostic */
  ignoredFilters: ReadonlySet<string>;
  filterFieldKeys: FilterFieldKeys;
  source: {
    baseUrl: string;
    path: string;
  };
  /** File name of the raw document inside the working directory */
  fileName: string;
}

export const SPOT_SEGMENT: SegmentConfig = {
  id: 'spot',
  kind: 'spot',
  venue: 'binance',
  ignoredFilters: new Set([
    'MAX_NUM_ALGO_ORDERS',
    'ICEBERG_PARTS',
    'MARKET_LOT_SIZE',
    'PERCENT_PRICE',
    'TRAILING_DELTA',
    'PERCENT_PRICE_BY_SIDE',
    'MAX_POSITION',
  ]),
  filterFieldKeys: { minNotional: 'minNotional', maxNumOrders: 'maxNumOrders' },
  source: { baseUrl: 'https://api.binance.com', path: '/api/v3/exchangeInfo' },
  fileName: 'binance_exchange-info.json',
};

const DERIVATIVE_IGNORED_FILTERS: ReadonlySet<string> = new Set([
  'MAX_NUM_ALGO_ORDERS',
  'ICEBERG_PARTS',
  'MARKET_LOT_SIZE',
  'PERCENT_PRICE',
]);

const DERIVATIVE_FILTER_FIELD_KEYS: FilterFieldKeys = { minNotional: 'notional', maxNumOrders: 'limit' };

export const USD_FUTURES_SEGMENT: SegmentConfig = {
  id: 'usdfut',
  kind: 'derivative',
  venue: 'binance_usdfut',
  ignoredFilters: DERIVATIVE_IGNORED_FILTERS,
  filterFieldKeys: DERIVATIVE_FILTER_FIELD_KEYS,
  source: { baseUrl: 'https://fapi.binance.com', path: '/fapi/v1/exchangeInfo' },
  fileName: 'binance_usdfut_exchange-info.json',
};

export const COIN_FUTURES_SEGMENT: SegmentConfig = {
  id: 'coinfut',
  kind: 'derivative',
  venue: 'binance_coinfut',
  ignoredFilters: DERIVATIVE_IGNORED_FILTERS,
  filterFieldKeys: DERIVATIVE_FILTER_FIELD_KEYS,
  source: { baseUrl: 'https://dapi.binance.com', path: '/dapi/v1/exchangeInfo' },
  fileName: 'binance_coinfut_exchange-info.json',
};

/** Segments in merge order: spot rows first, then USD-margined, then coin-margined. */
export const SEGMENTS: readonly SegmentConfig[] = [SPOT_SEGMENT, USD_FUTURES_SEGMENT, COIN_FUTURES_SEGMENT];

/** Output file of the parse step inside the working directory */
export const ASSETS_FILE_NAME = 'binance_assets.csv';
