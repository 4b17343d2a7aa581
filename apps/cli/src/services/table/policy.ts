/**
 * Column Policy Inference
 *
 * Decides per column whether values are opaque identifiers or numbers,
 * and for numbers how many fraction digits to show.
 */

import type { ColumnPolicy, NormalizeOptions, TableCellValue } from './types';

const NOT_A_NUMBER = 'nan';

/**
 * String form a value is inspected in; null and NaN both read as `nan`
 */
export function canonicalString(value: TableCellValue): string {
  if (value === null) return NOT_A_NUMBER;
  if (typeof value === 'number' && Number.isNaN(value)) return NOT_A_NUMBER;
  return String(value);
}

/**
 * Number of significant fraction digits in a value's string form.
 * Trailing zeros do not count; text without a `.` counts 0.
 */
export function countFractionDigits(value: string): number {
  if (value === NOT_A_NUMBER) {
    return 0;
  }
  if (value.includes('.')) {
    return value.split('.')[1].replace(/0+$/, '').length;
  }
  return 0;
}

/**
 * Largest fraction digit count over a column; 0 for integers, text and nulls
 */
export function maxFractionDigits(values: readonly TableCellValue[]): number {
  let max = 0;
  for (const value of values) {
    max = Math.max(max, countFractionDigits(canonicalString(value)));
  }
  return max;
}

export function isIdentifierColumn(name: string, identifierColumns: readonly string[]): boolean {
  return identifierColumns.includes(name);
}

/**
 * Choose the formatting policy of a column from its name and original values
 */
export function inferColumnPolicy(
  name: string,
  values: readonly TableCellValue[],
  options: Pick<NormalizeOptions, 'identifierColumns' | 'identifierWidth'>
): ColumnPolicy {
  if (isIdentifierColumn(name, options.identifierColumns)) {
    return { kind: 'identifier', width: options.identifierWidth };
  }
  return { kind: 'numeric', precision: maxFractionDigits(values) };
}

/**
 * Digit-count encoding of a policy: the negated field width for identifiers
 */
export function policyDigits(policy: ColumnPolicy): number {
  return policy.kind === 'identifier' ? -policy.width : policy.precision;
}
