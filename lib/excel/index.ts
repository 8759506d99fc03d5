/**
 * Workbook extraction module exports
 */

export { detectFormat, loadWorkbook, parseWorkbookBuffer } from './parser';
export { readTableDefinitions, resolveTableDefinitions } from './table-parts';
export { SheetGrid } from './sheet';
export type { RawFormula, RawValue, SheetGridOptions } from './sheet';

export { detectExplicitTables } from './explicit-tables';
export { detectImplicitTables } from './implicit-tables';
export type { ImplicitDetection, ImplicitDetectionOptions } from './implicit-tables';

export { classifyHeaderRow, HEADER_SAMPLE_ROWS } from './header-detector';
export type { HeaderClassification } from './header-detector';

export { parseFormulaReferences, tokenizeReferences } from './formula-references';
export type { ReferenceToken } from './formula-references';
export { extractFormulas } from './formula-extractor';

export { assembleSheet } from './assembler';
export { extractSheet, extractWorkbook, extractWorkbookFile } from './processor';
export type { ExtractOptions } from './processor';
