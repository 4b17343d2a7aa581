/**
 * Table Module
 *
 * Loads CSV data into typed tables, rewrites every cell into its display
 * string under a per-column policy, and renders the result as an image.
 *
 * @example
 * ```typescript
 * import { loadTable, normalizeTable, renderTable, SharpRasterizer } from './services/table';
 *
 * const table = await loadTable('report.csv', { delimiter: ',', quoteChar: '"', naValues: [''] });
 * const display = normalizeTable(table, {
 *   identifierColumns: ['SESSION_ID'],
 *   identifierWidth: 18,
 *   nullPlaceholder: '&empty;',
 *   locale: 'en-US',
 * });
 * const rendered = renderTable(display, style);
 * await new SharpRasterizer({ density: 144 }).rasterize(rendered, 'report.png');
 * ```
 */

// Types
export type {
  TableData,
  TableSchema,
  TableColumn,
  TableRow,
  TableCellValue,
  TableStyle,
  RenderedTable,
  TableRasterizer,
  ColumnAlign,
  ColumnPolicy,
  ColumnPolicyReport,
  LoadOptions,
  NormalizeOptions,
  ValueFormatOptions,
  PolicyListener,
} from './types';

// Loading
export { loadTable, parseTable, tableFromRecords, dedupeHeaders, parseNumber } from './loader';

// Policy inference
export {
  canonicalString,
  countFractionDigits,
  maxFractionDigits,
  isIdentifierColumn,
  inferColumnPolicy,
  policyDigits,
} from './policy';

// Cell rewriting
export { valueToString, normalizeTable } from './formatter';

// Rendering
export { decodeHtmlEntities } from './entities';
export { renderTable, layoutTable, measureText, displayText } from './renderer';
export type { TableLayout } from './renderer';
export { SharpRasterizer, MAX_SVG_PIXELS, bandOffsets } from './rasterizer';
export type { SharpRasterizerOptions } from './rasterizer';
