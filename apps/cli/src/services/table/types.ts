/**
 * Table Types
 *
 * Internal types for loading, normalizing and rendering tables.
 * Public types are re-exported from @csv2png/shared.
 */

import type {
  TableData,
  TableSchema,
  TableColumn,
  TableRow,
  TableCellValue,
  TableStyle,
  ColumnAlign,
  ColumnPolicy,
  ColumnPolicyReport,
} from '@csv2png/shared';

// Re-export shared types for convenience
export type {
  TableData,
  TableSchema,
  TableColumn,
  TableRow,
  TableCellValue,
  TableStyle,
  ColumnAlign,
  ColumnPolicy,
  ColumnPolicyReport,
};

/**
 * CSV loading options
 */
export interface LoadOptions {
  delimiter: string;
  quoteChar: string;
  /** Cell texts that load as null */
  naValues: readonly string[];
}

/**
 * Options driving policy inference and cell rewriting
 */
export interface NormalizeOptions {
  /** Exact column names treated as opaque identifiers */
  identifierColumns: readonly string[];
  /** Field width for identifier columns */
  identifierWidth: number;
  nullPlaceholder: string;
  /** BCP 47 locale used for digit grouping */
  locale: string;
}

/**
 * Options for rewriting a single value
 */
export interface ValueFormatOptions {
  nullPlaceholder: string;
  locale: string;
  /** Column name carried into formatting errors */
  column: string;
}

/**
 * Called once per column, after its policy is fixed and before its cells are rewritten
 */
export type PolicyListener = (report: ColumnPolicyReport) => void;

/**
 * A table drawn as SVG, sized in SVG user units
 */
export interface RenderedTable {
  /** The whole drawing as one document */
  svg: string;
  width: number;
  height: number;
  /** Document showing only the rows of the drawing from `top` down to `top + height` */
  band(top: number, height: number): string;
}

/**
 * Writes a rendered table as an image file
 */
export interface TableRasterizer {
  rasterize(table: RenderedTable, outputPath: string): Promise<void>;
}
