import { err, ok, type Result } from 'neverthrow';

import { FormatError } from './errors.js';

/** CME month codes, January to December */
export const MONTH_CODES = 'FGHJKMNQUVXZ';

/**
 * Turn a dated futures symbol `<root>_<YYMMDD>` into `<month code><year digit>`,
 * e.g. `BTCUSDT_240329` becomes `H4`.
 */
export function simplifyFutureCode(symbol: string): Result<string, FormatError> {
  const parts = symbol.split('_');
  const datePart = parts[1];
  if (parts.length !== 2 || datePart === undefined) {
    return err(new FormatError(`expected symbol to split into 2 parts, '${symbol}'`, symbol));
  }
  if (datePart.length !== 6) {
    return err(new FormatError(`expected symbol-date to have len 6, '${datePart}'`, symbol));
  }

  const month = Number(datePart.slice(2, 4));
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return err(new FormatError(`expected symbol-date month in 01..12, '${datePart}'`, symbol));
  }

  return ok(`${MONTH_CODES.charAt(month - 1)}${datePart.charAt(1)}`);
}
