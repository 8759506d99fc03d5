/**
 * Main workbook processor
 * Orchestrates table detection, formula extraction and assembly per sheet
 */

import { errorMessage } from '@/lib/errors';
import type { ExtractionResult, Rect, Sheet, SheetExtraction, Table, Workbook } from '@/lib/types';
import { tableBounds } from '@/lib/utils';
import { assembleSheet } from './assembler';
import { detectExplicitTables } from './explicit-tables';
import { extractFormulas } from './formula-extractor';
import { detectImplicitTables } from './implicit-tables';
import { loadWorkbook } from './parser';

// ============================================================================
// Types
// ============================================================================

export interface ExtractOptions {
  /** Checked between sheets */
  signal?: AbortSignal;
}

// ============================================================================
// Main Processor
// ============================================================================

/**
 * Extract tables and formulas from every sheet of a loaded workbook
 *
 * Pipeline per sheet:
 * 1. Extract formulas and their references
 * 2. Read declared (explicit) tables
 * 3. Detect implicit tables outside the explicit regions
 * 4. Assemble one non-overlapping table set and attach formulas
 *
 * A failure inside one sheet becomes a DetectionWarning on that sheet.
 */
export function extractWorkbook(workbook: Workbook, options: ExtractOptions = {}): ExtractionResult {
  const sheets: SheetExtraction[] = [];

  for (const sheet of workbook.sheets) {
    options.signal?.throwIfAborted();

    try {
      sheets.push(extractSheet(sheet));
    } catch (error) {
      console.error(`[Processor] Sheet "${sheet.name}" failed:`, error);
      sheets.push({
        sheet: sheet.name,
        tables: [],
        formulas: [],
        warnings: [
          {
            kind: 'DetectionWarning',
            sheet: sheet.name,
            message: `Sheet extraction failed: ${errorMessage(error)}`,
          },
        ],
      });
    }
  }

  const tableCount = sheets.reduce((sum, s) => sum + s.tables.length, 0);
  const formulaCount = sheets.reduce((sum, s) => sum + s.formulas.length, 0);
  console.log(
    `[Processor] ${workbook.fileName}: ${sheets.length} sheet(s), ${tableCount} table(s), ${formulaCount} formula(s)`
  );

  return { workbook: workbook.fileName, sheets };
}

/**
 * Run the full detection chain for a single sheet.
 *
 * Formulas are extracted first and independently of table detection, so a
 * detection failure still yields every formula (as sheet-level records)
 * alongside a DetectionWarning.
 */
export function extractSheet(sheet: Sheet): SheetExtraction {
  const { records, warnings } = extractFormulas(sheet);

  let explicit: Table[] = [];
  let implicit: Table[] = [];
  let discarded: Rect[] = [];

  try {
    explicit = detectExplicitTables(sheet);
    const detection = detectImplicitTables(sheet, {
      claimed: explicit.map(tableBounds),
      reservedNames: new Set(explicit.map((table) => table.name)),
    });
    implicit = detection.tables;
    discarded = detection.discarded;
  } catch (error) {
    console.error(`[Processor] Table detection failed on sheet "${sheet.name}":`, error);
    // Drop partial results
    explicit = [];
    implicit = [];
    discarded = [];
    warnings.push({
      kind: 'DetectionWarning',
      sheet: sheet.name,
      message: `Table detection failed: ${errorMessage(error)}`,
    });
  }

  return assembleSheet({ sheet, explicit, implicit, discarded, formulas: records, warnings });
}

/**
 * Load a workbook from disk and extract it
 */
export async function extractWorkbookFile(filePath: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const workbook = await loadWorkbook(filePath);
  return extractWorkbook(workbook, options);
}
