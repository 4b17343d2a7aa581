// ============ Table Types ============

/**
 * Cell value in a table.
 * Integers outside the safe integer range load as bigint so no digit is lost.
 */
export type TableCellValue = string | number | bigint | null;

export type ColumnAlign = 'left' | 'right';

/**
 * Column definition for a table schema
 */
export interface TableColumn {
  /** Column identifier (the de-duplicated header name) */
  id: string;
  /** Display header text */
  header: string;
  /** Text alignment for the column */
  align?: ColumnAlign;
}

/**
 * Table schema defining the structure
 */
export interface TableSchema {
  /** Ordered list of column definitions */
  columns: TableColumn[];
}

/**
 * A single row of data matching the schema
 */
export type TableRow<T = TableCellValue> = T[];

/**
 * Complete table data structure.
 * Rows carry no identity beyond their position; no row index is rendered.
 */
export interface TableData<T = TableCellValue> {
  /** Table schema with column definitions */
  schema: TableSchema;
  /** Array of rows, each row must have exactly schema.columns.length cells */
  rows: TableRow<T>[];
}

// ============ Formatting Policy ============

/**
 * Formatting rule chosen for one column.
 *
 * - `identifier`: verbatim integer, space-padded to `width`, never grouped
 * - `numeric`: grouped, with exactly `precision` fraction digits
 */
export type ColumnPolicy =
  | { kind: 'identifier'; width: number }
  | { kind: 'numeric'; precision: number };

/**
 * Policy chosen for a named column, as reported by normalization
 */
export interface ColumnPolicyReport {
  column: string;
  policy: ColumnPolicy;
}

// ============ Rendering ============

/**
 * Visual style of a rendered table
 */
export interface TableStyle {
  fontFamily: string;
  /** Font size in px */
  fontSize: number;
  /** Average glyph advance as a fraction of the font size */
  charWidth: number;
  paddingX: number;
  paddingY: number;
  textColor: string;
  background: string;
  headerBackground: string;
  stripeBackground: string;
  borderColor: string;
}

// ============ Conversion ============

export interface ConversionResult {
  input: string;
  output: string;
  policies: ColumnPolicyReport[];
}

export interface ConversionFailure {
  input: string;
  error: Error;
}

export interface BatchResult {
  converted: ConversionResult[];
  failed: ConversionFailure[];
}
