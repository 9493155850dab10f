export type CsvValue = string | number | boolean | undefined;

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => CsvValue;
}

const CSV_LINE_BREAK = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: CsvValue): string {
  if (value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';

  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

/**
 * Header line plus one line per row, every line terminated by CRLF.
 */
export function toCsv<T>(columns: readonly CsvColumn<T>[], rows: readonly T[]): string {
  const lines = [
    columns.map((column) => formatCsvField(column.header)),
    ...rows.map((row) => columns.map((column) => formatCsvField(column.value(row)))),
  ];
  return lines.map((fields) => `${fields.join(',')}${CSV_LINE_BREAK}`).join('');
}
