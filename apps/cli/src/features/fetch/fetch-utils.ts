import { COIN_FUTURES_SEGMENT, SPOT_SEGMENT, USD_FUTURES_SEGMENT, type SegmentConfig } from '@refdata/instruments';
import type { z } from 'zod';

import type { FetchCommandOptionsSchema } from '../shared/schemas.js';

export type FetchCommandOptions = z.infer<typeof FetchCommandOptionsSchema>;

/** Download order: USD-margined, coin-margined, then spot */
export const FETCH_ORDER: readonly SegmentConfig[] = [USD_FUTURES_SEGMENT, COIN_FUTURES_SEGMENT, SPOT_SEGMENT];

export interface FetchHandlerParams {
  /** Directory the raw documents are written to */
  dir: string;
}

export function buildFetchParamsFromFlags(options: FetchCommandOptions): FetchHandlerParams {
  return { dir: options.dir };
}

export function sourceUrl(segment: SegmentConfig): string {
  return `${segment.source.baseUrl}${segment.source.path}`;
}
