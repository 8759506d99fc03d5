/**
 * Explicit table detection
 * Reads the table objects a workbook declares; no inference involved
 */

import type { Sheet, Table, TableDefinition } from '@/lib/types';
import { compareRects } from '@/lib/utils';
import { buildHeaderLabels, makeUnique, synthesizeHeaders } from './header-detector';
import { buildTable, readRowValues } from './table-builder';

/**
 * Produce one `explicit` table per declared table object, in sheet order
 */
export function detectExplicitTables(sheet: Sheet): Table[] {
  return [...sheet.tables]
    .sort((a, b) => compareRects(a.bounds, b.bounds))
    .map((definition) => buildExplicitTable(sheet, definition));
}

function buildExplicitTable(sheet: Sheet, definition: TableDefinition): Table {
  const { bounds } = definition;
  const width = bounds.right - bounds.left + 1;
  const height = bounds.bottom - bounds.top + 1;

  const headerRowCount = Math.min(definition.headerRowCount, height);
  const totalsRowCount = Math.min(definition.totalsRowCount, height - headerRowCount);
  const hasHeaderRow = headerRowCount > 0;

  let headers: string[];
  if (!hasHeaderRow) {
    headers = synthesizeHeaders(width);
  } else if (definition.columns.length === width && definition.columns.every((name) => name.trim() !== '')) {
    headers = makeUnique(definition.columns.map((name) => name.trim()));
  } else {
    headers = buildHeaderLabels(readRowValues(sheet, bounds.top, bounds.left, bounds.right));
  }

  return buildTable(sheet, {
    name: definition.name,
    provenance: 'explicit',
    bounds,
    headers,
    hasHeaderRow,
    headerConfidence: 100,
    headerUncertain: false,
    headerRowCount,
    totalsRowCount,
  });
}
