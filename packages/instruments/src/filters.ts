import { err, ok, type Result } from 'neverthrow';

import type { DiagnosticSink } from './diagnostics.js';
import { FormatError } from './errors.js';
import { ConstraintValueSchema, type ConstraintValue, type RawFilter } from './schemas.js';
import type { SegmentConfig } from './segments.js';
import type { FilterConstraints } from './types.js';

export type ParsedFilter =
  | { kind: 'LOT_SIZE'; minQty: ConstraintValue; maxQty: ConstraintValue; stepSize: ConstraintValue }
  | { kind: 'MIN_NOTIONAL'; minNotional: ConstraintValue }
  | { kind: 'PRICE_FILTER'; tickSize: ConstraintValue }
  | { kind: 'MAX_NUM_ORDERS'; maxNumOrders: ConstraintValue }
  | { kind: 'ignored'; filterType: string }
  | { kind: 'unrecognized'; filterType: string };

function readField(filter: RawFilter, key: string): Result<ConstraintValue, FormatError> {
  const parsed = ConstraintValueSchema.safeParse(filter[key]);
  if (!parsed.success) {
    return err(
      new FormatError(`expected filter '${filter.filterType}' to carry '${key}'`, JSON.stringify(filter))
    );
  }
  return ok(parsed.data);
}

/**
 * Decode one filter entry using the segment's field names.
 * Known tags win over the ignore-set.
 */
export function parseFilter(filter: RawFilter, segment: SegmentConfig): Result<ParsedFilter, FormatError> {
  const { filterType } = filter;
  const keys = segment.filterFieldKeys;

  switch (filterType) {
    case 'LOT_SIZE':
      return readField(filter, 'minQty').andThen((minQty) =>
        readField(filter, 'maxQty').andThen((maxQty) =>
          readField(filter, 'stepSize').map((stepSize): ParsedFilter => ({ kind: 'LOT_SIZE', minQty, maxQty, stepSize }))
        )
      );
    case 'MIN_NOTIONAL':
      return readField(filter, keys.minNotional).map(
        (minNotional): ParsedFilter => ({ kind: 'MIN_NOTIONAL', minNotional })
      );
    case 'PRICE_FILTER':
      return readField(filter, 'tickSize').map((tickSize): ParsedFilter => ({ kind: 'PRICE_FILTER', tickSize }));
    case 'MAX_NUM_ORDERS':
      return readField(filter, keys.maxNumOrders).map(
        (maxNumOrders): ParsedFilter => ({ kind: 'MAX_NUM_ORDERS', maxNumOrders })
      );
    default: {
      const parsed: ParsedFilter = segment.ignoredFilters.has(filterType)
        ? { kind: 'ignored', filterType }
        : { kind: 'unrecognized', filterType };
      return ok(parsed);
    }
  }
}

/**
 * Fold a symbol's filter list into named constraints.
 *
 * Unrecognized tags are dropped with a warn-once diagnostic; a known tag
 * missing its payload field fails the whole document.
 */
export function extractFilterConstraints(
  filters: readonly RawFilter[],
  segment: SegmentConfig,
  diagnostics: DiagnosticSink
): Result<FilterConstraints, FormatError> {
  const constraints: FilterConstraints = {};

  for (const entry of filters) {
    const parsed = parseFilter(entry, segment);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const filter = parsed.value;
    switch (filter.kind) {
      case 'LOT_SIZE':
        constraints.minQty = filter.minQty;
        constraints.maxQty = filter.maxQty;
        constraints.lotQty = filter.stepSize;
        break;
      case 'MIN_NOTIONAL':
        constraints.minNotional = filter.minNotional;
        break;
      case 'PRICE_FILTER':
        constraints.tickSize = filter.tickSize;
        break;
      case 'MAX_NUM_ORDERS':
        constraints.maxNumOrders = filter.maxNumOrders;
        break;
      case 'ignored':
        break;
      case 'unrecognized':
        diagnostics.reportOnce({
          code: 'UNRECOGNIZED_FILTER',
          level: 'warn',
          message: `ignoring binance filter '${filter.filterType}'`,
        });
        break;
    }
  }

  return ok(constraints);
}
