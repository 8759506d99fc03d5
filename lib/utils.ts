/**
 * Shared helpers: ids, A1 addressing and rectangle geometry
 */

import { v4 as uuidv4 } from 'uuid';
import * as XLSX from 'xlsx';
import type { CellPosition, CellValue, Rect, Table } from '@/lib/types';

/** Maximum column index in a worksheet (XFD) */
export const MAX_COLUMN = 16384;

/** Maximum row index in a worksheet */
export const MAX_ROW = 1048576;

export const EMPTY: CellValue = { kind: 'empty' };

/**
 * Generate a unique identifier
 */
export function generateId(): string {
  return uuidv4();
}

// ============================================================================
// A1 Addressing
// ============================================================================

/**
 * Convert a 1-based column index to letters (1 -> A, 27 -> AA)
 */
export function columnLetter(column: number): string {
  return XLSX.utils.encode_col(column - 1);
}

/**
 * Convert column letters to a 1-based index (A -> 1, AA -> 27)
 */
export function columnNumber(letters: string): number {
  return XLSX.utils.decode_col(letters.toUpperCase()) + 1;
}

/**
 * Format a 1-based position as an A1 address
 */
export function cellAddress(position: CellPosition): string {
  return XLSX.utils.encode_cell({ r: position.row - 1, c: position.column - 1 });
}

/**
 * Format a rectangle as an A1 range ("A1:C5")
 */
export function rangeAddress(rect: Rect): string {
  return XLSX.utils.encode_range({
    s: { r: rect.top - 1, c: rect.left - 1 },
    e: { r: rect.bottom - 1, c: rect.right - 1 },
  });
}

/**
 * Parse an A1 range ("B2:D9" or "B2") into a rectangle
 */
export function parseRangeAddress(ref: string): Rect {
  const range = XLSX.utils.decode_range(ref);
  return {
    top: range.s.r + 1,
    left: range.s.c + 1,
    bottom: range.e.r + 1,
    right: range.e.c + 1,
  };
}

// ============================================================================
// Geometry
// ============================================================================

export function rectsIntersect(a: Rect, b: Rect): boolean {
  return a.left <= b.right && b.left <= a.right && a.top <= b.bottom && b.top <= a.bottom;
}

export function rectContains(rect: Rect, position: CellPosition): boolean {
  return (
    position.row >= rect.top &&
    position.row <= rect.bottom &&
    position.column >= rect.left &&
    position.column <= rect.right
  );
}

/**
 * Bounding rectangle of a table from its origin and extent
 */
export function tableBounds(table: Pick<Table, 'origin' | 'extent'>): Rect {
  return {
    top: table.origin.row,
    left: table.origin.column,
    bottom: table.origin.row + table.extent.rows - 1,
    right: table.origin.column + table.extent.columns - 1,
  };
}

/**
 * Order rectangles top-to-bottom, then left-to-right
 */
export function compareRects(a: Rect, b: Rect): number {
  return a.top - b.top || a.left - b.left || a.bottom - b.bottom || a.right - b.right;
}

// ============================================================================
// Values
// ============================================================================

/**
 * Render a cell value as plain text (used for header labels)
 */
export function cellValueToText(value: CellValue): string {
  switch (value.kind) {
    case 'text':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';
    case 'date':
      return Number.isNaN(value.value.getTime()) ? '' : value.value.toISOString().split('T')[0];
    case 'empty':
      return '';
  }
}
