/**
 * Formula extraction
 * One record per formula cell, with the references it depends on
 */

import { errorMessage, FormulaSyntaxError } from '@/lib/errors';
import type { ExtractionWarning, FormulaRecord, Rect, Sheet } from '@/lib/types';
import { cellAddress, rectContains } from '@/lib/utils';
import { parseFormulaReferences } from './formula-references';

export interface FormulaExtraction {
  records: FormulaRecord[];
  warnings: ExtractionWarning[];
}

/**
 * Collect every formula cell on a sheet (optionally within `bounds`) in
 * row-major order. A formula whose references cannot be tokenized keeps its
 * text, gets no references and produces a FormulaParseWarning.
 *
 * `table` and `readableFormula` are filled in later by the assembler.
 */
export function extractFormulas(sheet: Sheet, bounds?: Rect): FormulaExtraction {
  const records: FormulaRecord[] = [];
  const warnings: ExtractionWarning[] = [];

  for (const cell of sheet.cells()) {
    if (cell.formula === undefined) continue;

    const position = { row: cell.row, column: cell.column };
    if (bounds && !rectContains(bounds, position)) continue;

    const address = cellAddress(position);
    let references: FormulaRecord['references'] = [];

    try {
      references = parseFormulaReferences(cell.formula, sheet.name);
    } catch (error) {
      if (!(error instanceof FormulaSyntaxError)) throw error;
      warnings.push({
        kind: 'FormulaParseWarning',
        sheet: sheet.name,
        position,
        message: `Could not parse references in ${address} (${cell.formula}): ${errorMessage(error)}`,
      });
    }

    records.push({
      sheet: sheet.name,
      position,
      address,
      formula: cell.formula,
      references,
      readableFormula: cell.formula,
      table: null,
      cachedValue: cell.value,
    });
  }

  return { records, warnings };
}
