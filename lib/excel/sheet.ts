/**
 * In-memory sheet grid
 * Sparse, row-major cell storage shared read-only by all detectors
 */

import type { Cell, CellValue, Rect, Sheet, TableDefinition } from '@/lib/types';
import { EMPTY, rectContains } from '@/lib/utils';

// ============================================================================
// Types
// ============================================================================

/** Plain value accepted by {@link SheetGrid.fromRows} */
export type RawValue = string | number | boolean | Date | null | undefined;

/** A formula cell accepted by {@link SheetGrid.fromRows} */
export interface RawFormula {
  formula: string;
  value?: RawValue;
}

export interface SheetGridOptions {
  tables?: TableDefinition[];
  merges?: Rect[];
  hiddenRows?: Iterable<number>;
  hiddenColumns?: Iterable<number>;
}

// ============================================================================
// Sheet Grid
// ============================================================================

export class SheetGrid implements Sheet {
  readonly name: string;
  readonly tables: readonly TableDefinition[];
  readonly merges: readonly Rect[];
  readonly hiddenRows: ReadonlySet<number>;
  readonly hiddenColumns: ReadonlySet<number>;
  readonly usedRange: Rect | null;

  private readonly rows = new Map<number, Map<number, Cell>>();
  private readonly ordered: Cell[];

  constructor(name: string, cells: Iterable<Cell>, options: SheetGridOptions = {}) {
    this.name = name;
    this.tables = options.tables ?? [];
    this.merges = options.merges ?? [];
    this.hiddenRows = new Set(options.hiddenRows ?? []);
    this.hiddenColumns = new Set(options.hiddenColumns ?? []);

    const kept: Cell[] = [];
    for (const cell of cells) {
      if (cell.value.kind === 'empty' && !cell.formula) continue;

      let row = this.rows.get(cell.row);
      if (!row) {
        row = new Map();
        this.rows.set(cell.row, row);
      }
      row.set(cell.column, cell);
      kept.push(cell);
    }

    this.ordered = kept.sort((a, b) => a.row - b.row || a.column - b.column);
    this.usedRange = computeUsedRange(this.ordered);
  }

  /**
   * Build a sheet from a 2D array of plain values, starting at A1.
   * Strings beginning with '=' or {formula} objects become formula cells.
   */
  static fromRows(
    name: string,
    rows: (RawValue | RawFormula)[][],
    options: SheetGridOptions = {}
  ): SheetGrid {
    const cells: Cell[] = [];

    rows.forEach((rowValues, rowIndex) => {
      rowValues.forEach((raw, colIndex) => {
        const position = { row: rowIndex + 1, column: colIndex + 1 };

        if (typeof raw === 'string' && raw.startsWith('=')) {
          cells.push({ ...position, value: EMPTY, formula: raw });
        } else if (isRawFormula(raw)) {
          const formula = raw.formula.startsWith('=') ? raw.formula : `=${raw.formula}`;
          cells.push({ ...position, value: toCellValue(raw.value), formula });
        } else {
          cells.push({ ...position, value: toCellValue(raw) });
        }
      });
    });

    return new SheetGrid(name, cells, options);
  }

  getCell(row: number, column: number): Cell | undefined {
    return this.rows.get(row)?.get(column);
  }

  getValue(row: number, column: number): CellValue {
    return this.getCell(row, column)?.value ?? EMPTY;
  }

  getMergedValue(row: number, column: number): CellValue {
    const merge = this.merges.find((m) => rectContains(m, { row, column }));
    if (merge) {
      return this.getValue(merge.top, merge.left);
    }
    return this.getValue(row, column);
  }

  isOccupied(row: number, column: number): boolean {
    return this.getCell(row, column) !== undefined;
  }

  cells(): Cell[] {
    return [...this.ordered];
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRawFormula(raw: RawValue | RawFormula): raw is RawFormula {
  return typeof raw === 'object' && raw !== null && !(raw instanceof Date);
}

/**
 * Convert a plain JS value into a typed cell value
 */
export function toCellValue(raw: RawValue): CellValue {
  if (raw === null || raw === undefined) return EMPTY;
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (raw instanceof Date) return { kind: 'date', value: raw };
  return raw === '' ? EMPTY : { kind: 'text', value: raw };
}

function computeUsedRange(cells: Cell[]): Rect | null {
  if (cells.length === 0) return null;

  let top = Infinity;
  let left = Infinity;
  let bottom = -Infinity;
  let right = -Infinity;

  for (const cell of cells) {
    top = Math.min(top, cell.row);
    bottom = Math.max(bottom, cell.row);
    left = Math.min(left, cell.column);
    right = Math.max(right, cell.column);
  }

  return { top, left, bottom, right };
}
