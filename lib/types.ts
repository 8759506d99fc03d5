/**
 * Core type definitions for workbook table and formula extraction
 */

// ============================================================================
// Cell Types
// ============================================================================

/** Typed cell value; consumers switch on `kind` */
export type CellValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: Date }
  | { kind: 'empty' };

export type CellKind = CellValue['kind'];

/** 1-based cell coordinates */
export interface CellPosition {
  row: number;
  column: number;
}

/** A single non-empty cell */
export interface Cell extends CellPosition {
  /** Stored value (the cached result for formula cells) */
  value: CellValue;
  /** Formula text including the leading '=' */
  formula?: string;
  /** Number format code, when the workbook declares one */
  numberFormat?: string;
}

/** Inclusive rectangle of 1-based coordinates */
export interface Rect {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

// ============================================================================
// Workbook & Sheet Types
// ============================================================================

/** A table object declared in the workbook's own metadata */
export interface TableDefinition {
  name: string;
  displayName: string;
  /** A1-style range, e.g. "A1:C5" */
  ref: string;
  bounds: Rect;
  headerRowCount: number;
  totalsRowCount: number;
  /** Declared column names, in order */
  columns: string[];
}

/** Read-only view over one worksheet's cell grid */
export interface Sheet {
  readonly name: string;
  /** Declared table objects */
  readonly tables: readonly TableDefinition[];
  /** Merged cell regions */
  readonly merges: readonly Rect[];
  /** 1-based indices of hidden rows */
  readonly hiddenRows: ReadonlySet<number>;
  /** 1-based indices of hidden columns */
  readonly hiddenColumns: ReadonlySet<number>;
  /** Bounding box of occupied cells, or null for a blank sheet */
  readonly usedRange: Rect | null;
  getCell(row: number, column: number): Cell | undefined;
  getValue(row: number, column: number): CellValue;
  /** Value of the cell, or of the top-left cell of the merge covering it */
  getMergedValue(row: number, column: number): CellValue;
  /** True when the cell holds a value or a formula */
  isOccupied(row: number, column: number): boolean;
  /** All cells in row-major order */
  cells(): Cell[];
}

export type WorkbookFormat = 'xlsx' | 'xls';

/** Loaded workbook */
export interface Workbook {
  fileName: string;
  format: WorkbookFormat;
  sheets: Sheet[];
}

// ============================================================================
// Formula Reference Types
// ============================================================================

export interface CellReference {
  kind: 'cell';
  sheet: string;
  /** Normalized address without anchors, e.g. "B2" */
  address: string;
  row: number;
  column: number;
}

/** One corner of a range; null for an unbounded axis (A:A, 1:1) */
export interface RangeBound {
  row: number | null;
  column: number | null;
}

export interface RangeReference {
  kind: 'range';
  sheet: string;
  /** Normalized address, e.g. "A1:A10", "A:A", "1:3" */
  address: string;
  start: RangeBound;
  end: RangeBound;
}

export type FormulaReference = CellReference | RangeReference;

// ============================================================================
// Extraction Output Types
// ============================================================================

export type Provenance = 'explicit' | 'implicit';

/** One table data row keyed by header label */
export interface DataRow {
  /** Worksheet row number */
  row: number;
  values: Record<string, CellValue>;
}

export interface Table {
  name: string;
  sheet: string;
  provenance: Provenance;
  origin: CellPosition;
  extent: { rows: number; columns: number };
  /** Unique labels, one per column */
  headers: string[];
  /** Whether the first row supplied the header labels */
  hasHeaderRow: boolean;
  /** 0-100 */
  headerConfidence: number;
  headerUncertain: boolean;
  /** Rows at the bottom of an explicit table reserved for totals */
  totalsRowCount: number;
  rows: DataRow[];
}

export interface FormulaRecord {
  sheet: string;
  position: CellPosition;
  address: string;
  formula: string;
  references: FormulaReference[];
  /** Formula with in-table cell references replaced by [Header] labels */
  readableFormula: string;
  /** Owning table name; null for sheet-level formulas */
  table: string | null;
  cachedValue: CellValue;
}

export type WarningKind = 'DetectionWarning' | 'FormulaParseWarning' | 'SerializationError';

/** Non-fatal condition attached to a sheet's result */
export interface ExtractionWarning {
  kind: WarningKind;
  sheet: string;
  message: string;
  position?: CellPosition;
  table?: string;
}

export interface SheetExtraction {
  sheet: string;
  tables: Table[];
  formulas: FormulaRecord[];
  warnings: ExtractionWarning[];
}

/** Everything extracted from one workbook */
export interface ExtractionResult {
  workbook: string;
  sheets: SheetExtraction[];
}
