/**
 * Header row classification for table regions
 * Decides from a small sample of rows whether the first row holds labels
 */

import type { CellValue } from '@/lib/types';
import { cellValueToText } from '@/lib/utils';

// ============================================================================
// Types
// ============================================================================

export interface HeaderClassification {
  /** Treat the first row as header labels */
  hasHeader: boolean;
  /** Confidence score (0-100) */
  confidence: number;
  /** The sample did not match either clear pattern; resolved toward a header */
  uncertain: boolean;
  reasons: string[];
}

// ============================================================================
// Configuration
// ============================================================================

/** Rows handed to the classifier (first row + rows below it) */
export const HEADER_SAMPLE_ROWS = 5;

// ============================================================================
// Main Classifier
// ============================================================================

/**
 * Classify the first row of a sample as header or data.
 *
 * - No text in the first row: data, headers are synthesized.
 * - Only text in the first row and a number or date directly below: header.
 * - Anything else: header, flagged uncertain, so a table never silently
 *   loses its first row.
 */
export function classifyHeaderRow(sample: CellValue[][]): HeaderClassification {
  const reasons: string[] = [];
  const first = sample[0] ?? [];

  const nonEmpty = first.filter((cell) => cell.kind !== 'empty');
  const textCells = nonEmpty.filter((cell) => cell.kind === 'text').length;
  const emptyCells = first.length - nonEmpty.length;

  if (nonEmpty.length === 0) {
    reasons.push('First row is empty');
    return { hasHeader: false, confidence: 100, uncertain: false, reasons };
  }

  if (textCells === 0) {
    reasons.push('First row has no text cells');
    return { hasHeader: false, confidence: 90, uncertain: false, reasons };
  }

  const allText = textCells === nonEmpty.length;
  const numericBelow = (sample[1] ?? []).some(isNumericOrDate);

  if (allText && numericBelow) {
    reasons.push('All first-row cells are text', 'Numeric or date value in the next row');
    if (emptyCells > 0) {
      reasons.push(`${emptyCells} empty header cell(s)`);
    }
    return {
      hasHeader: true,
      confidence: emptyCells === 0 ? 95 : 85,
      uncertain: false,
      reasons,
    };
  }

  let confidence: number;
  if (allText) {
    reasons.push('All first-row cells are text', 'No numeric or date value in the next row');
    confidence = 50;
    if (sample.slice(2).some((row) => row.some(isNumericOrDate))) {
      reasons.push('Numeric or date values further down');
      confidence += 10;
    }
  } else {
    reasons.push(`Mixed first row (${textCells} of ${nonEmpty.length} cells are text)`);
    confidence = 30;
  }

  return { hasHeader: true, confidence, uncertain: true, reasons };
}

function isNumericOrDate(cell: CellValue): boolean {
  return cell.kind === 'number' || cell.kind === 'date';
}

// ============================================================================
// Header Labels
// ============================================================================

/**
 * Positional labels: Column1, Column2, ...
 */
export function synthesizeHeaders(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `Column${i + 1}`);
}

/**
 * Build unique labels from header cells. Empty cells fall back to the
 * positional name; duplicates get a `_<column>` suffix.
 */
export function buildHeaderLabels(cells: (CellValue | string)[]): string[] {
  const raw = cells.map((cell, i) => {
    const text = (typeof cell === 'string' ? cell : cellValueToText(cell)).trim();
    return text === '' ? `Column${i + 1}` : text;
  });

  return makeUnique(raw);
}

/** Labels that cannot be used as plain object keys in the exchange format */
const RESERVED_LABELS = ['__proto__'];

/**
 * Resolve label collisions by suffixing the 1-based column position.
 * Reserved labels always count as taken.
 */
export function makeUnique(labels: string[]): string[] {
  const taken = new Set<string>(RESERVED_LABELS);
  const result: string[] = [];

  labels.forEach((label, i) => {
    let candidate = label;
    if (taken.has(candidate)) {
      candidate = `${label}_${i + 1}`;
      let attempt = 2;
      while (taken.has(candidate)) {
        candidate = `${label}_${i + 1}_${attempt}`;
        attempt++;
      }
    }
    taken.add(candidate);
    result.push(candidate);
  });

  return result;
}
