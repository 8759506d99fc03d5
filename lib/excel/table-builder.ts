/**
 * Table construction shared by the explicit and implicit detectors
 */

import type { CellValue, DataRow, Provenance, Rect, Sheet, Table } from '@/lib/types';

export interface TableShape {
  name: string;
  provenance: Provenance;
  bounds: Rect;
  headers: string[];
  hasHeaderRow: boolean;
  headerConfidence: number;
  headerUncertain: boolean;
  /** Number of header rows at the top of `bounds` */
  headerRowCount: number;
  /** Number of totals rows at the bottom of `bounds` */
  totalsRowCount: number;
}

/**
 * Read a row's values across [left, right], resolving merged cells
 */
export function readRowValues(sheet: Sheet, row: number, left: number, right: number): CellValue[] {
  const values: CellValue[] = [];
  for (let column = left; column <= right; column++) {
    values.push(sheet.getMergedValue(row, column));
  }
  return values;
}

/**
 * Materialize a table: data rows between the header and totals rows,
 * keyed by header label. Hidden and fully empty rows are skipped.
 */
export function buildTable(sheet: Sheet, shape: TableShape): Table {
  const { bounds, headers } = shape;
  const rows: DataRow[] = [];

  const firstDataRow = bounds.top + shape.headerRowCount;
  const lastDataRow = bounds.bottom - shape.totalsRowCount;

  for (let row = firstDataRow; row <= lastDataRow; row++) {
    if (sheet.hiddenRows.has(row)) continue;

    const values = readRowValues(sheet, row, bounds.left, bounds.right);
    if (values.every((value) => value.kind === 'empty')) continue;

    rows.push({
      row,
      values: Object.fromEntries(headers.map((header, i) => [header, values[i]])),
    });
  }

  return {
    name: shape.name,
    sheet: sheet.name,
    provenance: shape.provenance,
    origin: { row: bounds.top, column: bounds.left },
    extent: {
      rows: bounds.bottom - bounds.top + 1,
      columns: bounds.right - bounds.left + 1,
    },
    headers,
    hasHeaderRow: shape.hasHeaderRow,
    headerConfidence: shape.headerConfidence,
    headerUncertain: shape.headerUncertain,
    totalsRowCount: shape.totalsRowCount,
    rows,
  };
}
