/**
 * Table Renderer
 *
 * Lays out a fully stringified table as an SVG document: a bold header row
 * on a shaded band, striped body rows and grid lines. No row index is drawn.
 * Horizontal bands of the same drawing can be cut out for tiled rasterizing.
 * Column widths come from a fixed per-character advance, so the style
 * should name a monospace font.
 */

import { XMLBuilder } from 'fast-xml-parser';
import { decodeHtmlEntities } from './entities';
import type {
  ColumnAlign,
  RenderedTable,
  TableData,
  TableStyle,
} from './types';

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';
const LINE_HEIGHT = 1.4;
// Baseline offset from the vertical centre of a row, as a fraction of the font size
const BASELINE_SHIFT = 0.35;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: true,
});

interface SvgText {
  '@_x': number;
  '@_y': number;
  '@_text-anchor': 'start' | 'end';
  '@_font-weight'?: 'bold';
  '#text': string;
}

interface SvgRect {
  '@_x': number;
  '@_y': number;
  '@_width': number;
  '@_height': number;
  '@_fill': string;
}

/**
 * Layout of a table in pixels
 */
export interface TableLayout {
  columnWidths: number[];
  rowHeight: number;
  width: number;
  height: number;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

// Characters XML 1.0 does not allow, and unpaired surrogates
const NON_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Text shown for a cell: character references decoded, kept on one line,
 * characters XML cannot carry replaced with U+FFFD
 */
export function displayText(value: string): string {
  return decodeHtmlEntities(value)
    .replace(/[\r\n]+/g, ' ')
    .replace(NON_XML_CHARS, '\uFFFD');
}

/**
 * Estimated advance width of a text in px
 */
export function measureText(text: string, style: Pick<TableStyle, 'fontSize' | 'charWidth'>): number {
  return [...text].length * style.fontSize * style.charWidth;
}

export function layoutTable(
  headers: string[],
  rows: string[][],
  style: TableStyle
): TableLayout {
  const columnWidths = headers.map((header, col) => {
    let widest = measureText(header, style);
    for (const row of rows) {
      widest = Math.max(widest, measureText(row[col], style));
    }
    return Math.ceil(widest) + 2 * style.paddingX;
  });

  const rowHeight = Math.round(style.fontSize * LINE_HEIGHT) + 2 * style.paddingY;
  const width = columnWidths.reduce((sum, w) => sum + w, 0) + 1;
  const height = rowHeight * (rows.length + 1) + 1;

  return { columnWidths, rowHeight, width, height };
}

function anchorFor(align: ColumnAlign | undefined): SvgText['@_text-anchor'] {
  return align === 'right' ? 'end' : 'start';
}

function textX(left: number, width: number, align: ColumnAlign | undefined, paddingX: number): number {
  return align === 'right' ? round(left + width - paddingX) : round(left + paddingX);
}

/**
 * Render a stringified table to SVG
 *
 * @throws Error if the table has no columns
 */
export function renderTable(table: TableData<string>, style: TableStyle): RenderedTable {
  if (table.schema.columns.length === 0) {
    throw new Error('Table must have at least one column');
  }

  const headers = table.schema.columns.map(col => displayText(col.header));
  const rows = table.rows.map(row => row.map(displayText));
  const layout = layoutTable(headers, rows, style);
  const { columnWidths, rowHeight, width, height } = layout;

  const columnLefts: number[] = [];
  let left = 0.5;
  for (const w of columnWidths) {
    columnLefts.push(left);
    left += w;
  }

  const rects: SvgRect[] = [
    { '@_x': 0, '@_y': 0, '@_width': width, '@_height': height, '@_fill': style.background },
    { '@_x': 0, '@_y': 0, '@_width': width, '@_height': rowHeight + 0.5, '@_fill': style.headerBackground },
  ];
  rows.forEach((_, index) => {
    // Every second body row is striped
    if (index % 2 === 1) {
      rects.push({
        '@_x': 0,
        '@_y': round(0.5 + rowHeight * (index + 1)),
        '@_width': width,
        '@_height': rowHeight,
        '@_fill': style.stripeBackground,
      });
    }
  });

  const gridLines: string[] = [];
  for (let r = 0; r <= rows.length + 1; r++) {
    const y = round(0.5 + rowHeight * r);
    gridLines.push(`M0 ${y}H${width}`);
  }
  for (const x of [...columnLefts, left]) {
    gridLines.push(`M${round(x)} 0V${height}`);
  }

  const baseline = (rowIndex: number): number =>
    round(0.5 + rowHeight * rowIndex + rowHeight / 2 + style.fontSize * BASELINE_SHIFT);

  const texts: SvgText[] = [];
  table.schema.columns.forEach((col, c) => {
    const x = textX(columnLefts[c], columnWidths[c], col.align, style.paddingX);
    const anchor = anchorFor(col.align);
    texts.push({
      '@_x': x,
      '@_y': baseline(0),
      '@_text-anchor': anchor,
      '@_font-weight': 'bold',
      '#text': headers[c],
    });
    rows.forEach((row, r) => {
      texts.push({ '@_x': x, '@_y': baseline(r + 1), '@_text-anchor': anchor, '#text': row[c] });
    });
  });

  const content = {
    rect: rects,
    path: {
      '@_d': gridLines.join(''),
      '@_stroke': style.borderColor,
      '@_stroke-width': 1,
      '@_fill': 'none',
    },
    g: {
      '@_font-family': style.fontFamily,
      '@_font-size': style.fontSize,
      '@_fill': style.textColor,
      '@_xml:space': 'preserve',
      text: texts,
    },
  };

  const band = (top: number, bandHeight: number): string =>
    builder.build({
      svg: {
        '@_xmlns': SVG_NAMESPACE,
        '@_width': width,
        '@_height': bandHeight,
        '@_viewBox': `0 ${top} ${width} ${bandHeight}`,
        ...content,
      },
    });

  return { svg: band(0, height), width, height, band };
}
