/**
 * Workbook loader using SheetJS
 * Reads values, formulas, merges, hidden rows/columns and declared tables
 * from .xlsx / .xls files
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { LoadError, LoadErrorReason, UnsupportedFormatError } from '@/lib/errors';
import type { Cell, CellValue, Rect, TableDefinition, Workbook, WorkbookFormat } from '@/lib/types';
import { EMPTY } from '@/lib/utils';
import { SheetGrid } from './sheet';
import { readTableDefinitions } from './table-parts';

// ============================================================================
// Configuration
// ============================================================================

const FORMAT_BY_EXTENSION: Record<string, WorkbookFormat> = {
  '.xlsx': 'xlsx',
  '.xls': 'xls',
};

/** ZIP local file header */
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

/** OLE compound document header (BIFF .xls) */
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

/** Error cell codes as stored in BIFF/OOXML */
const ERROR_CODES: Record<number, string> = {
  0x00: '#NULL!',
  0x07: '#DIV/0!',
  0x0f: '#VALUE!',
  0x17: '#REF!',
  0x1d: '#NAME?',
  0x24: '#NUM!',
  0x2a: '#N/A',
  0x2b: '#GETTING_DATA',
};

// ============================================================================
// Main Loader
// ============================================================================

/**
 * Determine the workbook format from a file path's extension.
 * Throws UnsupportedFormatError for anything but .xlsx / .xls.
 */
export function detectFormat(filePath: string): WorkbookFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(filePath, extension);
  }
  return format;
}

/**
 * Load a workbook from disk
 */
export async function loadWorkbook(filePath: string): Promise<Workbook> {
  const format = detectFormat(filePath);

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    const reason = isNotFound(error) ? LoadErrorReason.FILE_NOT_FOUND : LoadErrorReason.FILE_UNREADABLE;
    throw new LoadError(reason, filePath, { cause: error });
  }

  console.log(`[Loader] Loading ${path.basename(filePath)} (${buffer.length} bytes)`);
  return parseWorkbookBuffer(buffer, filePath, format);
}

/**
 * Parse an in-memory workbook. `filePath` names the workbook in results and errors.
 */
export async function parseWorkbookBuffer(
  buffer: Buffer,
  filePath: string,
  format: WorkbookFormat = detectFormat(filePath)
): Promise<Workbook> {
  const signature = format === 'xlsx' ? ZIP_SIGNATURE : OLE_SIGNATURE;
  if (!hasSignature(buffer, signature)) {
    throw new LoadError(LoadErrorReason.FILE_CORRUPTED, filePath);
  }

  let workbook: XLSX.WorkBook;
  let tableDefinitions = new Map<string, TableDefinition[]>();

  try {
    workbook = XLSX.read(buffer, {
      type: 'buffer',
      cellFormula: true,
      cellDates: true,
      cellNF: true,
      // Required for !cols / !rows (hidden flags)
      cellStyles: true,
    });

    // Legacy .xls has no table objects
    if (format === 'xlsx') {
      tableDefinitions = await readTableDefinitions(buffer);
    }
  } catch (error) {
    throw new LoadError(LoadErrorReason.FILE_CORRUPTED, filePath, { cause: error });
  }

  const sheets = workbook.SheetNames.map((sheetName) => {
    const worksheet = workbook.Sheets[sheetName];
    return parseWorksheet(sheetName, worksheet, tableDefinitions.get(sheetName) ?? []);
  });

  return {
    fileName: path.basename(filePath),
    format,
    sheets,
  };
}

// ============================================================================
// Worksheet Parsing
// ============================================================================

/**
 * Parse a single worksheet into a sparse grid
 */
function parseWorksheet(
  name: string,
  worksheet: XLSX.WorkSheet | undefined,
  tables: TableDefinition[]
): SheetGrid {
  if (!worksheet) {
    return new SheetGrid(name, [], { tables });
  }

  const cells: Cell[] = [];

  for (const address of Object.keys(worksheet)) {
    // Keys starting with '!' are sheet metadata (!ref, !merges, ...)
    if (address.startsWith('!')) continue;

    const cellObject: XLSX.CellObject | undefined = worksheet[address];
    if (!cellObject) continue;

    const { r, c } = XLSX.utils.decode_cell(address);
    const cell: Cell = {
      row: r + 1,
      column: c + 1,
      value: getCellValue(cellObject),
    };

    if (cellObject.f) {
      cell.formula = `=${cellObject.f}`;
    }
    if (typeof cellObject.z === 'string' && cellObject.z !== 'General') {
      cell.numberFormat = cellObject.z;
    }

    cells.push(cell);
  }

  const merges: Rect[] = (worksheet['!merges'] ?? []).map((range) => ({
    top: range.s.r + 1,
    left: range.s.c + 1,
    bottom: range.e.r + 1,
    right: range.e.c + 1,
  }));

  const hiddenColumns: number[] = [];
  (worksheet['!cols'] ?? []).forEach((info, index) => {
    if (info?.hidden) hiddenColumns.push(index + 1);
  });

  const hiddenRows: number[] = [];
  (worksheet['!rows'] ?? []).forEach((info, index) => {
    if (info?.hidden) hiddenRows.push(index + 1);
  });

  return new SheetGrid(name, cells, { tables, merges, hiddenRows, hiddenColumns });
}

/**
 * Extract a typed value from a SheetJS cell
 */
function getCellValue(cell: XLSX.CellObject): CellValue {
  const raw = cell.v;
  if (raw === undefined || raw === null) {
    return EMPTY;
  }

  switch (cell.t) {
    case 'n':
      return typeof raw === 'number' ? { kind: 'number', value: raw } : EMPTY;
    case 's':
      return typeof raw === 'string' && raw !== '' ? { kind: 'text', value: raw } : EMPTY;
    case 'b':
      return typeof raw === 'boolean' ? { kind: 'boolean', value: raw } : EMPTY;
    case 'd':
      return raw instanceof Date ? { kind: 'date', value: raw } : EMPTY;
    case 'e':
      // Error cells keep their code as text (#DIV/0!, #N/A, ...)
      return { kind: 'text', value: cell.w ?? (typeof raw === 'number' ? ERROR_CODES[raw] : undefined) ?? '#ERROR' };
    case 'z':
      return EMPTY;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function hasSignature(buffer: Buffer, signature: number[]): boolean {
  return buffer.length >= signature.length && signature.every((byte, i) => buffer[i] === byte);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
