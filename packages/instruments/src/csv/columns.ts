export type CsvValue = string | number | boolean | null;

/** A sparse row: absent and `undefined` fields both render as empty cells. */
export type CsvRecord = Readonly<Record<string, CsvValue | undefined>>;

/**
 * Output columns: `keyField` first, then every other field in the order it
 * is first seen across `records`.
 */
export function discoverColumns(records: readonly CsvRecord[], keyField: string): string[] {
  const columns = [keyField];
  const seen = new Set(columns);

  for (const record of records) {
    for (const [field, value] of Object.entries(record)) {
      if (value === undefined || seen.has(field)) continue;
      seen.add(field);
      columns.push(field);
    }
  }

  return columns;
}
