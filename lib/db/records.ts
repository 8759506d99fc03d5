/**
 * Persistence record sets
 * Flattens an exchange document into the three record sets the store writes
 */

import type { EncodedValue, ExchangeDocument } from '@/lib/exchange';
import { generateId as defaultGenerateId } from '@/lib/utils';

// ============================================================================
// Types
// ============================================================================

export type JsonScalar = string | number | boolean | null;

export interface TableMetadataRecord {
  id: string;
  fileName: string;
  sheetName: string;
  tableName: string;
  /** Position of the table within the workbook, from 0 */
  ordinal: number;
  provenance: 'explicit' | 'implicit';
  cellRange: string;
  rowCount: number;
  columnCount: number;
  headers: string[];
  headerConfidence: number;
  headerUncertain: boolean;
}

export interface TableDataRecord {
  id: string;
  tableId: string;
  /** Worksheet row number */
  rowIndex: number;
  data: Record<string, JsonScalar>;
}

export interface FormulaDataRecord {
  id: string;
  /** Owning table; null for sheet-level formulas */
  tableId: string | null;
  fileName: string;
  sheetName: string;
  cellAddress: string;
  rowIndex: number;
  columnIndex: number;
  formula: string;
  readableFormula: string;
  /** Sheet-qualified references, e.g. "Data!A1:A10" */
  dependencies: string[];
}

export interface PersistenceRecords {
  tableMetadata: TableMetadataRecord[];
  tableData: TableDataRecord[];
  formulas: FormulaDataRecord[];
}

export interface RecordOptions {
  generateId?: () => string;
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Build one self-consistent snapshot of a workbook. Every data row and
 * formula points at its owning table through the generated table id.
 */
export function buildPersistenceRecords(document: ExchangeDocument, options: RecordOptions = {}): PersistenceRecords {
  const generateId = options.generateId ?? defaultGenerateId;
  const records: PersistenceRecords = { tableMetadata: [], tableData: [], formulas: [] };
  let ordinal = 0;

  for (const sheet of document.sheets) {
    const tableIds = new Map<string, string>();

    for (const table of sheet.tables) {
      const tableId = generateId();
      tableIds.set(table.name, tableId);

      records.tableMetadata.push({
        id: tableId,
        fileName: document.workbook,
        sheetName: sheet.name,
        tableName: table.name,
        ordinal: ordinal++,
        provenance: table.provenance,
        cellRange: table.range,
        rowCount: table.rows.length,
        columnCount: table.extent.columns,
        headers: table.headers,
        headerConfidence: table.headerConfidence,
        headerUncertain: table.headerUncertain,
      });

      for (const dataRow of table.rows) {
        records.tableData.push({
          id: generateId(),
          tableId,
          rowIndex: dataRow.row,
          data: Object.fromEntries(
            Object.entries(dataRow.values).map(([header, value]) => [header, toJsonScalar(value)])
          ),
        });
      }
    }

    for (const formula of sheet.formulas) {
      records.formulas.push({
        id: generateId(),
        tableId: formula.table === null ? null : (tableIds.get(formula.table) ?? null),
        fileName: document.workbook,
        sheetName: sheet.name,
        cellAddress: formula.address,
        rowIndex: formula.position.row,
        columnIndex: formula.position.column,
        formula: formula.formula,
        readableFormula: formula.readableFormula,
        dependencies: formula.references.map((reference) => `${reference.sheet}!${reference.address}`),
      });
    }
  }

  return records;
}

function toJsonScalar(value: EncodedValue): JsonScalar {
  return value.type === 'empty' ? null : value.value;
}
