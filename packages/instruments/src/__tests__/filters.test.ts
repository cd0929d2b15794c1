import { describe, expect, it } from 'vitest';

import { DiagnosticSink } from '../diagnostics.js';
import { FormatError } from '../errors.js';
import { extractFilterConstraints, parseFilter } from '../filters.js';
import { SPOT_SEGMENT, USD_FUTURES_SEGMENT } from '../segments.js';

describe('parseFilter', () => {
  it('should read LOT_SIZE fields verbatim', () => {
    const result = parseFilter(
      { filterType: 'LOT_SIZE', minQty: '0.00100000', maxQty: '100000.00000000', stepSize: '0.00100000' },
      SPOT_SEGMENT
    );

    expect(result._unsafeUnwrap()).toEqual({
      kind: 'LOT_SIZE',
      minQty: '0.00100000',
      maxQty: '100000.00000000',
      stepSize: '0.00100000',
    });
  });

  it('should read segment-specific field names', () => {
    expect(parseFilter({ filterType: 'MIN_NOTIONAL', notional: '5' }, USD_FUTURES_SEGMENT)._unsafeUnwrap()).toEqual({
      kind: 'MIN_NOTIONAL',
      minNotional: '5',
    });
    expect(parseFilter({ filterType: 'MAX_NUM_ORDERS', limit: 200 }, USD_FUTURES_SEGMENT)._unsafeUnwrap()).toEqual({
      kind: 'MAX_NUM_ORDERS',
      maxNumOrders: 200,
    });
  });

  it('should classify ignored and unknown tags', () => {
    expect(parseFilter({ filterType: 'ICEBERG_PARTS', limit: 10 }, SPOT_SEGMENT)._unsafeUnwrap()).toEqual({
      kind: 'ignored',
      filterType: 'ICEBERG_PARTS',
    });
    expect(parseFilter({ filterType: 'NOTIONAL', minNotional: '5' }, SPOT_SEGMENT)._unsafeUnwrap()).toEqual({
      kind: 'unrecognized',
      filterType: 'NOTIONAL',
    });
  });

  it('should keep an explicit null field value', () => {
    expect(parseFilter({ filterType: 'PRICE_FILTER', tickSize: null }, SPOT_SEGMENT)._unsafeUnwrap()).toEqual({
      kind: 'PRICE_FILTER',
      tickSize: null,
    });
  });

  it('should fail when a known filter lacks its field', () => {
    const error = parseFilter({ filterType: 'MIN_NOTIONAL', minNotional: '5' }, USD_FUTURES_SEGMENT)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(FormatError);
    expect(error.message).toBe("expected filter 'MIN_NOTIONAL' to carry 'notional'");
    expect(error.input).toBe('{"filterType":"MIN_NOTIONAL","minNotional":"5"}');
  });
});

describe('extractFilterConstraints', () => {
  it('should fold filters into named constraints', () => {
    const diagnostics = new DiagnosticSink();

    const result = extractFilterConstraints(
      [
        { filterType: 'PRICE_FILTER', minPrice: '0.01', maxPrice: '1000000', tickSize: '0.01' },
        { filterType: 'LOT_SIZE', minQty: '0.001', maxQty: '9000', stepSize: '0.001' },
        { filterType: 'MAX_NUM_ORDERS', maxNumOrders: 200 },
        { filterType: 'PERCENT_PRICE', multiplierUp: '5' },
      ],
      SPOT_SEGMENT,
      diagnostics
    );

    expect(result._unsafeUnwrap()).toEqual({
      tickSize: '0.01',
      minQty: '0.001',
      maxQty: '9000',
      lotQty: '0.001',
      maxNumOrders: 200,
    });
    expect(diagnostics.count()).toBe(0);
  });

  it('should return no constraints for an empty list', () => {
    expect(extractFilterConstraints([], SPOT_SEGMENT, new DiagnosticSink())._unsafeUnwrap()).toEqual({});
  });

  it('should warn once per unrecognized tag across records', () => {
    const diagnostics = new DiagnosticSink();
    const filters = [{ filterType: 'NEW_FILTER' }];

    for (let index = 0; index < 3; index++) {
      extractFilterConstraints(filters, SPOT_SEGMENT, diagnostics)._unsafeUnwrap();
    }

    expect(diagnostics.diagnostics).toEqual([
      { code: 'UNRECOGNIZED_FILTER', level: 'warn', message: "ignoring binance filter 'NEW_FILTER'" },
    ]);
  });

  it('should treat a spot-only ignored tag as unrecognized on derivatives', () => {
    const diagnostics = new DiagnosticSink();

    extractFilterConstraints([{ filterType: 'TRAILING_DELTA' }], USD_FUTURES_SEGMENT, diagnostics)._unsafeUnwrap();

    expect(diagnostics.count('UNRECOGNIZED_FILTER')).toBe(1);
  });

  it('should fail on the first malformed known filter', () => {
    const result = extractFilterConstraints(
      [{ filterType: 'LOT_SIZE', minQty: '1', maxQty: '2' }],
      SPOT_SEGMENT,
      new DiagnosticSink()
    );

    expect(result._unsafeUnwrapErr().message).toBe("expected filter 'LOT_SIZE' to carry 'stepSize'");
  });
});
