import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

/**
 * A row of a court export: column name -> raw cell text
 */
export type TableRow = Record<string, string>;

export interface Table {
  /** Header names, trimmed, in file order */
  columns: string[];
  rows: TableRow[];
}

export interface CodecOptions {
  delimiter: string;
}

/**
 * Parse CSV bytes into a header and keyed rows
 *
 * Court exports are UTF-8, `;`-separated, sometimes with a BOM and with
 * ragged rows. Short rows are padded with empty cells.
 */
export function parseTable(input: Buffer | string, options: CodecOptions): Table {
  const records: string[][] = parse(input, {
    delimiter: options.delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...body] = records;
  const columns = header.map((name) => name.trim());

  const rows = body.map((record) => {
    const row: TableRow = {};
    columns.forEach((column, index) => {
      row[column] = record[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Header of a CSV file, without parsing its body
 */
export function readTableHeader(input: Buffer | string, options: CodecOptions): string[] {
  const records: string[][] = parse(input, {
    delimiter: options.delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    to_line: 1,
  });

  return records.length === 0 ? [] : records[0].map((name) => name.trim());
}

export interface SerializeOptions extends CodecOptions {
  missing?: string;
  /** Write the header line; off when appending to an existing file */
  header?: boolean;
}

/**
 * Serialize rows in the given column order, header first
 *
 * Cells absent from a row are written as `missing`.
 */
export function serializeTable(
  columns: readonly string[],
  rows: readonly TableRow[],
  options: SerializeOptions
): string {
  const missing = options.missing ?? '';
  const records: string[][] = options.header === false ? [] : [[...columns]];
  for (const row of rows) {
    records.push(columns.map((column) => row[column] ?? missing));
  }

  return stringify(records, {
    delimiter: options.delimiter,
    record_delimiter: 'unix',
  });
}
