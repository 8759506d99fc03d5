/**
 * Table assembly
 * Merges explicit and implicit detections into one non-overlapping table set
 * per sheet and attaches every formula to the table that contains it
 */

import type { ExtractionWarning, FormulaRecord, Rect, Sheet, SheetExtraction, Table } from '@/lib/types';
import { rangeAddress, rectContains, rectsIntersect, tableBounds } from '@/lib/utils';
import { type ReferenceToken, tokenizeReferences } from './formula-references';

export interface AssemblyInput {
  sheet: Sheet;
  explicit: Table[];
  implicit: Table[];
  /** Implicit candidates the detector dropped for intersecting an explicit table */
  discarded?: Rect[];
  formulas: FormulaRecord[];
  /** Warnings already raised for this sheet (formula parsing, ...) */
  warnings?: ExtractionWarning[];
}

/**
 * Produce the sheet's extraction entry.
 *
 * Explicit tables are accepted first, in order; implicit tables follow and are
 * accepted only when they overlap nothing accepted so far, so explicit
 * detections always win. Each formula goes to the table whose bounds contain it.
 */
export function assembleSheet(input: AssemblyInput): SheetExtraction {
  const { sheet } = input;
  const warnings: ExtractionWarning[] = [...(input.warnings ?? [])];
  const accepted: { table: Table; bounds: Rect }[] = [];

  const detectionWarning = (message: string, table?: string) => {
    console.warn(`[Assembler] Sheet "${sheet.name}": ${message}`);
    warnings.push({ kind: 'DetectionWarning', sheet: sheet.name, message, ...(table ? { table } : {}) });
  };

  for (const table of [...input.explicit, ...input.implicit]) {
    const bounds = tableBounds(table);
    const conflict = accepted.find((entry) => rectsIntersect(entry.bounds, bounds));

    if (conflict) {
      detectionWarning(
        `${table.provenance} table "${table.name}" (${rangeAddress(bounds)}) overlaps ` +
          `"${conflict.table.name}" (${rangeAddress(conflict.bounds)}) and was dropped`,
        table.name
      );
      continue;
    }

    accepted.push({ table, bounds });
  }

  for (const region of input.discarded ?? []) {
    detectionWarning(`Implicit candidate ${rangeAddress(region)} overlaps an explicit table and was discarded`);
  }

  // Accepted tables never overlap, so at most one contains a given cell
  const formulas = input.formulas.map((record) => {
    const owner = accepted.find((entry) => rectContains(entry.bounds, record.position));
    return {
      ...record,
      table: owner ? owner.table.name : null,
      readableFormula: readableFormula(record, accepted),
    };
  });

  const tables = accepted.map((entry) => entry.table);
  if (tables.length === 0) {
    detectionWarning('No tables detected');
  }

  return { sheet: sheet.name, tables, formulas, warnings };
}

/**
 * Replace same-sheet cell references that fall inside a table with that
 * table's column header, e.g. `=B2*C2` -> `=[Qty]*[Price]`
 */
export function readableFormula(record: FormulaRecord, tables: readonly { table: Table; bounds: Rect }[]): string {
  let tokens: ReferenceToken[];
  try {
    tokens = tokenizeReferences(record.formula, record.sheet);
  } catch {
    // Unparseable formulas already carry a FormulaParseWarning
    return record.formula;
  }

  let result = '';
  let cursor = 0;

  for (const token of tokens) {
    const { reference } = token;
    if (reference.kind !== 'cell' || reference.sheet !== record.sheet) continue;

    const owner = tables.find((entry) => rectContains(entry.bounds, reference));
    if (!owner) continue;

    const header = owner.table.headers[reference.column - owner.bounds.left];
    result += `${record.formula.slice(cursor, token.start)}[${header}]`;
    cursor = token.end;
  }

  return result + record.formula.slice(cursor);
}
