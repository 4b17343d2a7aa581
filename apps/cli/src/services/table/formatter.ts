/**
 * Cell Rewriting
 *
 * Turns original cell values into display strings, one column at a time.
 * A column's policy is fixed from all of its original values before any of
 * its cells is rewritten.
 */

import { InvalidNumericFormatError, describeError } from '../errors';
import { inferColumnPolicy, policyDigits } from './policy';
import type {
  NormalizeOptions,
  PolicyListener,
  TableCellValue,
  TableData,
  ValueFormatOptions,
} from './types';

const numberFormats = new Map<string, Intl.NumberFormat>();

function groupedFormat(locale: string, digits: number): Intl.NumberFormat {
  const key = `${locale}:${digits}`;
  let format = numberFormats.get(key);
  if (!format) {
    format = new Intl.NumberFormat(locale, {
      useGrouping: true,
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    });
    numberFormats.set(key, format);
  }
  return format;
}

function toPlainInteger(value: number | bigint, column: string): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!Number.isInteger(value)) {
    throw new InvalidNumericFormatError(value, column, 'identifier values must be integers');
  }
  // BigInt avoids exponent notation for large magnitudes
  return BigInt(value).toString();
}

/**
 * Convert one value to its display string.
 *
 * @param digits - fraction digits; negative means a verbatim integer padded to `-digits` characters
 * @throws InvalidNumericFormatError when the value cannot be written under `digits`
 */
export function valueToString(
  value: TableCellValue,
  digits: number,
  options: ValueFormatOptions
): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || (typeof value === 'number' && Number.isNaN(value))) {
    return options.nullPlaceholder;
  }
  if (digits < 0) {
    return toPlainInteger(value, options.column).padStart(-digits, ' ');
  }

  try {
    return groupedFormat(options.locale, digits).format(value);
  } catch (error) {
    // Intl rejects fraction digit counts it does not support
    throw new InvalidNumericFormatError(value, options.column, describeError(error), error);
  }
}

/**
 * Rewrite every cell of a table into its display string.
 *
 * The schema is kept; `onPolicy` sees each column's policy before that
 * column is rewritten.
 */
export function normalizeTable(
  table: TableData<TableCellValue>,
  options: NormalizeOptions,
  onPolicy?: PolicyListener
): TableData<string> {
  const rows: string[][] = table.rows.map(() => []);

  table.schema.columns.forEach((column, col) => {
    const values = table.rows.map(row => row[col] ?? null);
    const policy = inferColumnPolicy(column.id, values, options);
    onPolicy?.({ column: column.id, policy });

    const digits = policyDigits(policy);
    const formatOptions: ValueFormatOptions = {
      nullPlaceholder: options.nullPlaceholder,
      locale: options.locale,
      column: column.id,
    };
    values.forEach((value, row) => {
      rows[row][col] = valueToString(value, digits, formatOptions);
    });
  });

  return {
    schema: { columns: table.schema.columns.map(column => ({ ...column })) },
    rows,
  };
}
