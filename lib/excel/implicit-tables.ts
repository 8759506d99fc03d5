/**
 * Implicit table detection
 * Infers table regions from layout: rectangular blocks of content separated
 * from everything else by fully blank (or hidden) rows and columns
 */

import type { CellPosition, CellValue, Rect, Sheet, Table } from '@/lib/types';
import { compareRects, rangeAddress, rectContains, rectsIntersect, tableBounds } from '@/lib/utils';
import { buildHeaderLabels, classifyHeaderRow, HEADER_SAMPLE_ROWS, synthesizeHeaders } from './header-detector';
import { buildTable, readRowValues } from './table-builder';

// ============================================================================
// Types
// ============================================================================

export interface ImplicitDetectionOptions {
  /** Regions already claimed by explicit tables */
  claimed?: readonly Rect[];
  /** Table names already in use on the sheet */
  reservedNames?: ReadonlySet<string>;
}

export interface ImplicitDetection {
  tables: Table[];
  /** Candidate blocks dropped because they intersect a claimed region */
  discarded: Rect[];
}

// ============================================================================
// Configuration
// ============================================================================

/** One header row plus at least one data row */
const MIN_BLOCK_ROWS = 2;
const MIN_BLOCK_COLUMNS = 1;

// ============================================================================
// Main Detector
// ============================================================================

/**
 * Detect layout-inferred tables on a sheet
 */
export function detectImplicitTables(sheet: Sheet, options: ImplicitDetectionOptions = {}): ImplicitDetection {
  const claimed = options.claimed ?? [];
  const reserved = new Set(options.reservedNames ?? []);

  if (!sheet.usedRange) {
    return { tables: [], discarded: [] };
  }

  const grid = new OccupancyGrid(sheet, claimed);
  const blocks = segment(grid, sheet.usedRange)
    .filter(
      (block) =>
        block.bottom - block.top + 1 >= MIN_BLOCK_ROWS && block.right - block.left + 1 >= MIN_BLOCK_COLUMNS
    )
    .sort(compareRects);

  const tables: Table[] = [];
  const discarded: Rect[] = [];
  let ordinal = reserved.size;

  for (const block of blocks) {
    if (claimed.some((region) => rectsIntersect(region, block))) {
      discarded.push(block);
      continue;
    }

    let name: string;
    do {
      ordinal++;
      name = `Table ${ordinal}`;
    } while (reserved.has(name));
    reserved.add(name);

    tables.push(buildImplicitTable(sheet, block, name));
  }

  if (tables.length > 0) {
    console.log(
      `[Detector] Sheet "${sheet.name}": ${tables.length} implicit table(s) at ` +
        tables.map((t) => rangeAddress(tableBounds(t))).join(', ')
    );
  }

  return { tables, discarded };
}

function buildImplicitTable(sheet: Sheet, block: Rect, name: string): Table {
  const sample: CellValue[][] = [];
  for (let row = block.top; row <= Math.min(block.bottom, block.top + HEADER_SAMPLE_ROWS - 1); row++) {
    sample.push(readRowValues(sheet, row, block.left, block.right));
  }

  const classification = classifyHeaderRow(sample);
  const width = block.right - block.left + 1;

  return buildTable(sheet, {
    name,
    provenance: 'implicit',
    bounds: block,
    headers: classification.hasHeader ? buildHeaderLabels(sample[0]) : synthesizeHeaders(width),
    hasHeaderRow: classification.hasHeader,
    headerConfidence: classification.confidence,
    headerUncertain: classification.uncertain,
    headerRowCount: classification.hasHeader ? 1 : 0,
    totalsRowCount: 0,
  });
}

// ============================================================================
// Segmentation
// ============================================================================

/**
 * Recursive X-Y cut. The box is trimmed to its content, split into bands at
 * fully blank rows, and otherwise at fully blank columns. A box with neither
 * is a block.
 */
function segment(grid: OccupancyGrid, box: Rect): Rect[] {
  const trimmed = grid.trim(box);
  if (!trimmed) return [];

  const rowBands = grid.rowBands(trimmed);
  if (rowBands.length > 1) {
    return rowBands.flatMap((band) => segment(grid, band));
  }

  const columnBands = grid.columnBands(trimmed);
  if (columnBands.length > 1) {
    return columnBands.flatMap((band) => segment(grid, band));
  }

  return [trimmed];
}

/**
 * Sparse set of occupied positions; claimed regions and hidden columns read
 * as blank. Every query walks the occupied cells only, never the box area.
 */
class OccupancyGrid {
  private readonly points: CellPosition[];

  constructor(sheet: Sheet, claimed: readonly Rect[]) {
    this.points = sheet
      .cells()
      .filter(
        (cell) =>
          !sheet.hiddenColumns.has(cell.column) && !claimed.some((region) => rectContains(region, cell))
      )
      .map((cell) => ({ row: cell.row, column: cell.column }));
  }

  /**
   * Shrink a box to the extent of its occupied cells; null when empty
   */
  trim(box: Rect): Rect | null {
    let top = Infinity;
    let left = Infinity;
    let bottom = -Infinity;
    let right = -Infinity;

    for (const point of this.within(box)) {
      top = Math.min(top, point.row);
      bottom = Math.max(bottom, point.row);
      left = Math.min(left, point.column);
      right = Math.max(right, point.column);
    }

    return top === Infinity ? null : { top, left, bottom, right };
  }

  /**
   * Maximal runs of rows that have content within the box's columns
   */
  rowBands(box: Rect): Rect[] {
    return runs(this.within(box).map((point) => point.row)).map(([top, bottom]) => ({
      top,
      left: box.left,
      bottom,
      right: box.right,
    }));
  }

  /**
   * Maximal runs of columns that have content within the box's rows
   */
  columnBands(box: Rect): Rect[] {
    return runs(this.within(box).map((point) => point.column)).map(([left, right]) => ({
      top: box.top,
      left,
      bottom: box.bottom,
      right,
    }));
  }

  private within(box: Rect): CellPosition[] {
    return this.points.filter((point) => rectContains(box, point));
  }
}

/**
 * Collapse indices into sorted [start, end] runs of consecutive values
 */
function runs(indices: number[]): [number, number][] {
  const sorted = [...new Set(indices)].sort((a, b) => a - b);
  const result: [number, number][] = [];

  for (const index of sorted) {
    const last = result[result.length - 1];
    if (last && last[1] === index - 1) {
      last[1] = index;
    } else {
      result.push([index, index]);
    }
  }

  return result;
}
