/**
 * Table Loader
 *
 * Reads a CSV file into a typed table. A column whose every non-missing
 * cell is a decimal number literal loads as numbers (right-aligned);
 * any other column keeps its cells as text (left-aligned).
 */

import { promises as fs } from 'fs';
import Papa from 'papaparse';
import type { ParseError } from 'papaparse';
import { InputReadError, describeError } from '../errors';
import type { LoadOptions, TableCellValue, TableColumn, TableData } from './types';

const NUMBER_LITERAL = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const INTEGER_LITERAL = /^\s*[+-]?\d+\s*$/;

/**
 * Parse a numeric cell, keeping integers beyond the safe range exact
 */
export function parseNumber(text: string): number | bigint {
  const value = Number(text);
  if (INTEGER_LITERAL.test(text)) {
    if (!Number.isSafeInteger(value)) return BigInt(text.trim());
    // Integers have no negative zero
    if (value === 0) return 0;
  }
  return value;
}

/**
 * Name empty headers `Unnamed: <index>` and suffix repeated ones with `.1`, `.2`, ...
 */
export function dedupeHeaders(headers: string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();

  return headers.map((raw, index) => {
    const base = raw === '' ? `Unnamed: ${index}` : raw;
    let name = base;
    let count = counts.get(base) ?? 0;
    while (seen.has(name)) {
      count += 1;
      name = `${base}.${count}`;
    }
    counts.set(base, count);
    seen.add(name);
    return name;
  });
}

function describeParseError(error: ParseError): string {
  return `${error.message}${error.row !== undefined ? ` (row ${error.row + 1})` : ''}`;
}

/**
 * Build a typed table from already split CSV records (first record is the header)
 */
export function tableFromRecords(
  records: string[][],
  options: Pick<LoadOptions, 'naValues'>,
  source = '<memory>'
): TableData<TableCellValue> {
  if (records.length === 0) {
    throw new InputReadError(source, 'no columns to parse (file is empty)');
  }

  const [headerRecord, ...body] = records;
  const names = dedupeHeaders(headerRecord);
  const width = names.length;
  const missing = new Set(options.naValues);

  const textRows: (string | null)[][] = body.map((record, index) => {
    if (record.length > width) {
      throw new InputReadError(
        source,
        `row ${index + 2} has ${record.length} fields but the header has ${width}`
      );
    }
    const cells: (string | null)[] = record.map(cell => (missing.has(cell) ? null : cell));
    while (cells.length < width) {
      cells.push(null);
    }
    return cells;
  });

  const numericColumns = names.map((_, col) =>
    textRows.every(row => {
      const cell = row[col];
      return cell === null || NUMBER_LITERAL.test(cell);
    })
  );

  const columns: TableColumn[] = names.map((name, col) => ({
    id: name,
    header: name,
    align: numericColumns[col] ? 'right' : 'left',
  }));

  const rows = textRows.map(row =>
    row.map((cell, col): TableCellValue => {
      if (cell === null) return null;
      return numericColumns[col] ? parseNumber(cell) : cell;
    })
  );

  return { schema: { columns }, rows };
}

/**
 * Parse CSV text into a typed table
 */
export function parseTable(
  text: string,
  options: LoadOptions,
  source = '<memory>'
): TableData<TableCellValue> {
  const content = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const result = Papa.parse<string[]>(content, {
    delimiter: options.delimiter,
    quoteChar: options.quoteChar,
    escapeChar: options.quoteChar,
    header: false,
    dynamicTyping: false,
    skipEmptyLines: true,
  });

  const quoteError = result.errors.find(error => error.type === 'Quotes');
  if (quoteError) {
    throw new InputReadError(source, describeParseError(quoteError));
  }

  return tableFromRecords(result.data, options, source);
}

/**
 * Load a CSV file into a typed table
 */
export async function loadTable(filePath: string, options: LoadOptions): Promise<TableData<TableCellValue>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputReadError(filePath, describeError(error), error);
  }

  return parseTable(text, options, filePath);
}
