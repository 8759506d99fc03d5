/**
 * LLM prompt templates for workbook documentation
 */

import type { ExchangeSheet } from '@/lib/exchange';
import type { FormulaPattern } from './patterns';

// ============================================================================
// System Prompt
// ============================================================================

export const SYSTEM_PROMPT = `You are a spreadsheet documentation expert. You receive the tables and the UNIQUE formula patterns extracted from one worksheet and explain what the sheet does.

## CRITICAL RULES

1. **Use readable formulas**: describe dependencies with the column names shown in "readableFormula" (e.g. "Actual - Budget"), NOT cell addresses (e.g. "C5 - B5")
2. **Plain text only**: CAPITALIZED HEADINGS, numbered lists and blank lines. No markdown (#, **, -, backticks)
3. **Group by pattern**: each pattern is listed once with the cells it applies to; never document the same pattern twice
4. **Header uncertainty**: when a table is marked "headerUncertain", say that its first row may be data rather than column labels
5. **Stay factual**: do not invent tables, columns or formulas that are not in the input

## OUTPUT FORMAT

Write exactly these four parts, each introduced by a divider line of "=" characters:

PART 1: OVERVIEW
  Sheet purpose, how the data is organized, the main tables, the key calculations.

PART 2: FORMULA DOCUMENTATION (GROUPED BY PATTERN)
  For each pattern: readable formula, occurrence count, cells it applies to, purpose, dependencies in plain language.

PART 3: DEPENDENCY ANALYSIS
  Which formulas feed which, which tables and other sheets are referenced, suspicious or broken references.

PART 4: INSIGHTS & RECOMMENDATIONS
  Dominant patterns, hardcoded values that should be inputs, overly complex formulas, naming improvements.`;

// ============================================================================
// User Prompt Builder
// ============================================================================

/**
 * Build the per-sheet prompt from the sheet's tables and formula patterns
 */
export function buildSheetPrompt(workbook: string, sheet: ExchangeSheet, patterns: FormulaPattern[]): string {
  const tables = sheet.tables.map((table) => ({
    name: table.name,
    provenance: table.provenance,
    range: table.range,
    headers: table.headers,
    headerUncertain: table.headerUncertain,
    dataRows: table.rows.length,
  }));

  const warnings = sheet.warnings.map((warning) => `${warning.kind}: ${warning.message}`);

  let prompt = `Workbook: "${workbook}"\nSheet: "${sheet.name}"\n\n`;
  prompt += `TABLES (${tables.length}):\n${JSON.stringify(tables, null, 2)}\n\n`;
  prompt += `UNIQUE FORMULA PATTERNS (${patterns.length} patterns, ${sheet.formulas.length} formulas):\n`;
  prompt += `${JSON.stringify(patterns, null, 2)}\n`;

  if (warnings.length > 0) {
    prompt += `\nEXTRACTION WARNINGS:\n${warnings.join('\n')}\n`;
  }

  prompt += '\nDocument this sheet.';
  return prompt;
}
