/**
 * Exchange document serializer
 * Renders an ExtractionResult to the exchange format and rebuilds it back
 */

import { errorMessage, ExchangeFormatError, SerializationError } from '@/lib/errors';
import type {
  CellPosition,
  CellValue,
  DataRow,
  ExtractionResult,
  ExtractionWarning,
  FormulaRecord,
  SheetExtraction,
  Table,
} from '@/lib/types';
import { cellAddress, rangeAddress, tableBounds } from '@/lib/utils';
import {
  EXCHANGE_FORMAT_VERSION,
  exchangeDocumentSchema,
  type EncodedValue,
  type ExchangeDocument,
  type ExchangeFormula,
  type ExchangeSheet,
  type ExchangeTable,
  type ExchangeWarning,
} from './schema';

// ============================================================================
// Value Encoding
// ============================================================================

/**
 * Encode a cell value. Throws SerializationError for values with no
 * encoding (non-finite numbers, invalid dates).
 */
export function encodeCellValue(value: CellValue, sheet: string, position: CellPosition): EncodedValue {
  switch (value.kind) {
    case 'number':
      if (!Number.isFinite(value.value)) {
        throw new SerializationError(
          `Number ${value.value} at ${cellAddress(position)} has no encoding`,
          sheet,
          position
        );
      }
      return { type: 'number', value: value.value };
    case 'text':
      return { type: 'text', value: value.value };
    case 'boolean':
      return { type: 'boolean', value: value.value };
    case 'date':
      if (Number.isNaN(value.value.getTime())) {
        throw new SerializationError(`Invalid date at ${cellAddress(position)} has no encoding`, sheet, position);
      }
      return { type: 'date', value: value.value.toISOString() };
    case 'empty':
      return { type: 'empty' };
  }
}

export function decodeCellValue(encoded: EncodedValue): CellValue {
  switch (encoded.type) {
    case 'number':
      return { kind: 'number', value: encoded.value };
    case 'text':
      return { kind: 'text', value: encoded.value };
    case 'boolean':
      return { kind: 'boolean', value: encoded.value };
    case 'date':
      return { kind: 'date', value: new Date(encoded.value) };
    case 'empty':
      return { kind: 'empty' };
  }
}

// ============================================================================
// Serialize
// ============================================================================

/**
 * Render one workbook's extraction as an exchange document.
 * Unencodable cells become `{type: 'empty'}` and add a SerializationError
 * warning to their sheet.
 */
export function serializeExtraction(result: ExtractionResult): ExchangeDocument {
  return {
    version: EXCHANGE_FORMAT_VERSION,
    workbook: result.workbook,
    sheets: result.sheets.map(serializeSheet),
  };
}

function serializeSheet(extraction: SheetExtraction): ExchangeSheet {
  const { sheet } = extraction;
  const errors: SerializationError[] = [];

  const encode = (value: CellValue, position: CellPosition): EncodedValue => {
    try {
      return encodeCellValue(value, sheet, position);
    } catch (error) {
      if (!(error instanceof SerializationError)) throw error;
      errors.push(error);
      return { type: 'empty' };
    }
  };

  const tables = extraction.tables.map((table) => serializeTable(table, encode));
  const formulas = extraction.formulas.map((record) => serializeFormula(record, encode));

  const warnings: ExchangeWarning[] = [
    ...extraction.warnings.map(serializeWarning),
    ...errors.map((error) => ({
      kind: 'SerializationError' as const,
      message: error.message,
      position: error.position,
    })),
  ];

  return { name: sheet, tables, formulas, warnings };
}

function serializeTable(
  table: Table,
  encode: (value: CellValue, position: CellPosition) => EncodedValue
): ExchangeTable {
  return {
    name: table.name,
    provenance: table.provenance,
    range: rangeAddress(tableBounds(table)),
    origin: { ...table.origin },
    extent: { ...table.extent },
    headers: [...table.headers],
    hasHeaderRow: table.hasHeaderRow,
    headerConfidence: table.headerConfidence,
    headerUncertain: table.headerUncertain,
    totalsRowCount: table.totalsRowCount,
    rows: table.rows.map((dataRow) => ({
      row: dataRow.row,
      values: Object.fromEntries(
        table.headers.map((header, i) => [
          header,
          encode(dataRow.values[header] ?? { kind: 'empty' }, {
            row: dataRow.row,
            column: table.origin.column + i,
          }),
        ])
      ),
    })),
  };
}

function serializeFormula(
  record: FormulaRecord,
  encode: (value: CellValue, position: CellPosition) => EncodedValue
): ExchangeFormula {
  return {
    address: record.address,
    position: { ...record.position },
    formula: record.formula,
    readableFormula: record.readableFormula,
    table: record.table,
    references: record.references.map((reference) =>
      reference.kind === 'cell'
        ? { ...reference }
        : { ...reference, start: { ...reference.start }, end: { ...reference.end } }
    ),
    cachedValue: encode(record.cachedValue, record.position),
  };
}

function serializeWarning(warning: ExtractionWarning): ExchangeWarning {
  return {
    kind: warning.kind,
    message: warning.message,
    ...(warning.position ? { position: { ...warning.position } } : {}),
    ...(warning.table !== undefined ? { table: warning.table } : {}),
  };
}

/**
 * Pretty-printed JSON text of a document
 */
export function toJson(document: ExchangeDocument): string {
  return JSON.stringify(document, null, 2);
}

// ============================================================================
// Deserialize
// ============================================================================

/**
 * Validate an untrusted value as an exchange document
 */
export function parseExchangeDocument(input: unknown): ExchangeDocument {
  const validation = exchangeDocumentSchema.safeParse(input);
  if (!validation.success) {
    throw new ExchangeFormatError(
      validation.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return validation.data;
}

/**
 * Parse and validate exchange JSON text
 */
export function parseExchangeJson(text: string): ExchangeDocument {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw new ExchangeFormatError([`(root): ${errorMessage(error)}`]);
  }
  return parseExchangeDocument(input);
}

/**
 * Rebuild the entity graph from a document
 */
export function toExtractionResult(document: ExchangeDocument): ExtractionResult {
  return {
    workbook: document.workbook,
    sheets: document.sheets.map((sheet) => ({
      sheet: sheet.name,
      tables: sheet.tables.map((table) => restoreTable(sheet.name, table)),
      formulas: sheet.formulas.map((formula) => restoreFormula(sheet.name, formula)),
      warnings: sheet.warnings.map((warning) => ({ ...warning, sheet: sheet.name })),
    })),
  };
}

function restoreTable(sheet: string, table: ExchangeTable): Table {
  const rows: DataRow[] = table.rows.map((dataRow) => ({
    row: dataRow.row,
    values: Object.fromEntries(
      Object.entries(dataRow.values).map(([header, value]) => [header, decodeCellValue(value)])
    ),
  }));

  return {
    name: table.name,
    sheet,
    provenance: table.provenance,
    origin: table.origin,
    extent: table.extent,
    headers: table.headers,
    hasHeaderRow: table.hasHeaderRow,
    headerConfidence: table.headerConfidence,
    headerUncertain: table.headerUncertain,
    totalsRowCount: table.totalsRowCount,
    rows,
  };
}

function restoreFormula(sheet: string, formula: ExchangeFormula): FormulaRecord {
  return {
    sheet,
    position: formula.position,
    address: formula.address,
    formula: formula.formula,
    references: formula.references,
    readableFormula: formula.readableFormula,
    table: formula.table,
    cachedValue: decodeCellValue(formula.cachedValue),
  };
}
