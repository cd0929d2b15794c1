import { getLogger } from '@refdata/logger';

import { DiagnosticSink } from '../diagnostics.js';

import { discoverColumns, type CsvRecord, type CsvValue } from './columns.js';

export interface CsvWriteOptions {
  delimiter?: string | undefined;
  /** Receives one diagnostic per dropped duplicate */
  diagnostics?: DiagnosticSink | undefined;
}

/**
 * Serialize `records` keyed by `keyField`.
 *
 * The first record for each key wins and later ones are dropped with a
 * diagnostic. Rows are ordered by key, not by input position. Values are
 * written as-is: a value containing the delimiter is not quoted.
 */
export function writeCsv<K extends string>(
  records: readonly (CsvRecord & Readonly<Record<K, CsvValue>>)[],
  keyField: K,
  options: CsvWriteOptions = {}
): string {
  const delimiter = options.delimiter ?? ',';
  const columns = discoverColumns(records, keyField);
  const diagnostics = options.diagnostics ?? new DiagnosticSink(getLogger('csv'));
  const rows = new Map<string, CsvRecord>();

  for (const record of records) {
    const key = String(record[keyField]);
    if (rows.has(key)) {
      diagnostics.report({
        code: 'DUPLICATE_KEY',
        level: 'warn',
        message: `ignoring duplicate row for '${key}'`,
      });
      continue;
    }
    rows.set(key, record);
  }

  const lines = [columns.join(delimiter)];
  for (const key of [...rows.keys()].sort()) {
    const record = rows.get(key);
    if (!record) continue;
    lines.push(columns.map((column) => formatCell(record[column])).join(delimiter));
  }

  return lines.map((line) => `${line}\n`).join('');
}

function formatCell(value: CsvValue | undefined): string {
  return value === undefined || value === null ? '' : String(value);
}
