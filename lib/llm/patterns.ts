/**
 * Formula pattern grouping
 * Collapses formulas that repeat the same calculation (e.g. one per row) into
 * a single pattern so each is documented once
 */

import { type ReferenceToken, tokenizeReferences } from '@/lib/excel/formula-references';
import type { ExchangeFormula } from '@/lib/exchange';
import type { FormulaReference } from '@/lib/types';

export interface FormulaPattern {
  /** Grouping key: readable formula, or the formula in relative notation */
  pattern: string;
  formulaExample: string;
  readableFormula: string;
  /** Addresses of every cell that uses the pattern, in sheet order */
  cells: string[];
  occurrenceCount: number;
  /** Qualified references of the first occurrence */
  references: string[];
  table: string | null;
}

/**
 * Group a sheet's formulas by pattern, in order of first occurrence.
 *
 * Formulas annotated with header names group by their readable text
 * (`=[Qty]*[Price]`). Others group by a relative rendering of their
 * references, so `=A1+1` in B1 and `=A2+1` in B2 both read `=R[0]C[-1]+1`.
 */
export function groupFormulasByPattern(formulas: ExchangeFormula[], sheet: string): FormulaPattern[] {
  const groups = new Map<string, FormulaPattern>();

  for (const formula of formulas) {
    const key = patternKey(formula, sheet);
    const existing = groups.get(key);

    if (existing) {
      existing.cells.push(formula.address);
      existing.occurrenceCount++;
      continue;
    }

    groups.set(key, {
      pattern: key,
      formulaExample: formula.formula,
      readableFormula: formula.readableFormula,
      cells: [formula.address],
      occurrenceCount: 1,
      references: formula.references.map((reference) => qualifiedAddress(reference, sheet)),
      table: formula.table,
    });
  }

  return [...groups.values()];
}

/**
 * Grouping key for a formula
 */
export function patternKey(formula: ExchangeFormula, sheet: string): string {
  if (formula.readableFormula !== formula.formula) {
    return formula.readableFormula;
  }

  let tokens: ReferenceToken[];
  try {
    tokens = tokenizeReferences(formula.formula, sheet);
  } catch {
    // Unparseable formulas group by their text
    return formula.formula;
  }

  let key = '';
  let cursor = 0;
  for (const token of tokens) {
    key += formula.formula.slice(cursor, token.start) + relativeReference(token.reference, formula.position, sheet);
    cursor = token.end;
  }
  return key + formula.formula.slice(cursor);
}

function relativeReference(
  reference: FormulaReference,
  origin: { row: number; column: number },
  sheet: string
): string {
  const prefix = reference.sheet === sheet ? '' : `'${reference.sheet.replace(/'/g, "''")}'!`;

  const corner = (row: number | null, column: number | null): string =>
    (row === null ? '' : `R[${row - origin.row}]`) + (column === null ? '' : `C[${column - origin.column}]`);

  if (reference.kind === 'cell') {
    return prefix + corner(reference.row, reference.column);
  }
  return `${prefix}${corner(reference.start.row, reference.start.column)}:${corner(reference.end.row, reference.end.column)}`;
}

function qualifiedAddress(reference: FormulaReference, sheet: string): string {
  return reference.sheet === sheet ? reference.address : `${reference.sheet}!${reference.address}`;
}
