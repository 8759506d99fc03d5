/**
 * Workbook documentation generator
 * One completion per sheet, concatenated into a plain-text report
 */

import type { ExchangeDocument, ExchangeSheet } from '@/lib/exchange';
import type { CompletionClient } from './client';
import { groupFormulasByPattern } from './patterns';
import { buildSheetPrompt, SYSTEM_PROMPT } from './prompts';

// ============================================================================
// Types
// ============================================================================

export interface SheetDocumentation {
  sheet: string;
  formulaCount: number;
  patternCount: number;
  text: string;
  error?: string;
}

export interface WorkbookDocumentation {
  workbook: string;
  sheets: SheetDocumentation[];
  /** Full report, ready to write to disk */
  text: string;
}

const DIVIDER = '='.repeat(80);
const RULE = '-'.repeat(80);

// ============================================================================
// Generator
// ============================================================================

export class DocumentationGenerator {
  constructor(private readonly client: CompletionClient) {}

  /**
   * Document every sheet that has tables or formulas
   */
  async generate(document: ExchangeDocument): Promise<WorkbookDocumentation> {
    const documented = document.sheets.filter((sheet) => sheet.tables.length > 0 || sheet.formulas.length > 0);
    const sheets: SheetDocumentation[] = [];

    for (const sheet of documented) {
      sheets.push(await this.generateSheet(document.workbook, sheet));
    }

    return {
      workbook: document.workbook,
      sheets,
      text: renderReport(document, sheets),
    };
  }

  /**
   * Document a single sheet. A failed completion yields an error section
   * instead of throwing.
   */
  async generateSheet(workbook: string, sheet: ExchangeSheet): Promise<SheetDocumentation> {
    const patterns = groupFormulasByPattern(sheet.formulas, sheet.name);
    console.log(
      `[LLM] Sheet "${sheet.name}": ${sheet.formulas.length} formula(s), ${patterns.length} unique pattern(s)`
    );

    const result = await this.client.complete(SYSTEM_PROMPT, buildSheetPrompt(workbook, sheet, patterns));

    const base = { sheet: sheet.name, formulaCount: sheet.formulas.length, patternCount: patterns.length };
    if (result.text === null) {
      const error = result.error ?? 'No response';
      return { ...base, text: `Error generating documentation for ${sheet.name}: ${error}`, error };
    }
    return { ...base, text: result.text.trim() };
  }
}

// ============================================================================
// Report Rendering
// ============================================================================

function renderReport(document: ExchangeDocument, sheets: SheetDocumentation[]): string {
  const totalFormulas = document.sheets.reduce((sum, sheet) => sum + sheet.formulas.length, 0);
  const totalTables = document.sheets.reduce((sum, sheet) => sum + sheet.tables.length, 0);

  const lines = [
    DIVIDER,
    'WORKBOOK DOCUMENTATION',
    DIVIDER,
    '',
    `Workbook: ${document.workbook}`,
    `Total Sheets: ${document.sheets.length}`,
    `Total Tables: ${totalTables}`,
    `Total Formulas: ${totalFormulas}`,
    '',
    DIVIDER,
    '',
    'TABLE OF CONTENTS',
    RULE,
    '',
    ...sheets.map((sheet, i) => `${i + 1}. ${sheet.sheet}`),
    '',
    DIVIDER,
  ];

  for (const sheet of sheets) {
    lines.push(
      '',
      `SHEET: ${sheet.sheet}`,
      `Formulas: ${sheet.formulaCount} (${sheet.patternCount} unique patterns)`,
      RULE,
      '',
      sheet.text,
      '',
      DIVIDER
    );
  }

  return lines.join('\n') + '\n';
}
