import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export type CsvValue = string | number;

export function csvEscape(value: CsvValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return '"' + text.replace(/"/g, '""') + '"';
  }
  return text;
}

/** Header row plus one line per record, in `columns` order, `\n`-terminated. */
export function toCsv<K extends string>(
  columns: readonly K[],
  records: readonly Record<K, CsvValue>[],
): string {
  const rows = [columns.map(csvEscape).join(',')];
  for (const record of records) {
    rows.push(columns.map(column => csvEscape(record[column])).join(','));
  }
  return rows.join('\n') + '\n';
}

/** Overwrites `filePath`, creating its directory if needed. */
export function writeCsv<K extends string>(
  filePath: string,
  columns: readonly K[],
  records: readonly Record<K, CsvValue>[],
): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, toCsv(columns, records));
}
