/**
 * DuckDB extraction store
 * Writes one snapshot per workbook into three tables:
 * table_metadata, table_data and excel_formulas
 */

import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api';
import { z } from 'zod';
import type { ExchangeDocument } from '@/lib/exchange';
import { buildPersistenceRecords, type PersistenceRecords, type RecordOptions } from './records';

// ============================================================================
// Types
// ============================================================================

export interface StoredTable {
  id: string;
  fileName: string;
  sheetName: string;
  tableName: string;
  provenance: string;
  cellRange: string;
  rowCount: number;
  headers: string[];
}

export interface SaveSummary {
  tables: number;
  rows: number;
  formulas: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS table_metadata (
    id VARCHAR PRIMARY KEY,
    file_name VARCHAR NOT NULL,
    sheet_name VARCHAR NOT NULL,
    table_name VARCHAR NOT NULL,
    ordinal INTEGER NOT NULL,
    provenance VARCHAR NOT NULL,
    cell_range VARCHAR NOT NULL,
    row_count INTEGER NOT NULL,
    column_count INTEGER NOT NULL,
    headers VARCHAR NOT NULL,
    header_confidence DOUBLE NOT NULL,
    header_uncertain BOOLEAN NOT NULL,
    created_at TIMESTAMP DEFAULT current_timestamp
  )`,
  `CREATE TABLE IF NOT EXISTS table_data (
    id VARCHAR PRIMARY KEY,
    table_id VARCHAR NOT NULL REFERENCES table_metadata(id),
    row_index INTEGER NOT NULL,
    data VARCHAR NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS excel_formulas (
    id VARCHAR PRIMARY KEY,
    table_id VARCHAR REFERENCES table_metadata(id),
    file_name VARCHAR NOT NULL,
    sheet_name VARCHAR NOT NULL,
    cell_address VARCHAR NOT NULL,
    row_index INTEGER NOT NULL,
    column_index INTEGER NOT NULL,
    formula VARCHAR NOT NULL,
    readable_formula VARCHAR NOT NULL,
    dependencies VARCHAR NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_metadata_file_sheet ON table_metadata(file_name, sheet_name)',
  'CREATE INDEX IF NOT EXISTS idx_data_table ON table_data(table_id)',
  'CREATE INDEX IF NOT EXISTS idx_formula_file_sheet ON excel_formulas(file_name, sheet_name)',
];

const headersSchema = z.array(z.string());

// ============================================================================
// Database Class
// ============================================================================

/**
 * Extraction store backed by a DuckDB file (or `:memory:`)
 */
export class ExtractionDatabase {
  private instance: DuckDBInstance | null = null;

  constructor(private readonly path: string = ':memory:') {}

  /**
   * Open the database and create the schema
   */
  async initialize(): Promise<void> {
    if (this.instance) return;

    this.instance = await DuckDBInstance.create(this.path);
    await this.withConnection(async (conn) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await conn.run(statement);
      }
    });
    console.log(`[DuckDB] Database initialized (${this.path})`);
  }

  /**
   * Write a workbook snapshot in a single transaction
   */
  async saveWorkbook(document: ExchangeDocument, options: RecordOptions = {}): Promise<SaveSummary> {
    return this.saveRecords(buildPersistenceRecords(document, options));
  }

  /**
   * Write prepared record sets in a single transaction
   */
  async saveRecords(records: PersistenceRecords): Promise<SaveSummary> {
    await this.withConnection(async (conn) => {
      await conn.run('BEGIN TRANSACTION');

      try {
        for (const table of records.tableMetadata) {
          await conn.run(
            `INSERT INTO table_metadata (id, file_name, sheet_name, table_name, ordinal, provenance, cell_range,
              row_count, column_count, headers, header_confidence, header_uncertain)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              table.id,
              table.fileName,
              table.sheetName,
              table.tableName,
              table.ordinal,
              table.provenance,
              table.cellRange,
              table.rowCount,
              table.columnCount,
              JSON.stringify(table.headers),
              table.headerConfidence,
              table.headerUncertain,
            ]
          );
        }

        for (const row of records.tableData) {
          await conn.run('INSERT INTO table_data (id, table_id, row_index, data) VALUES (?, ?, ?, ?)', [
            row.id,
            row.tableId,
            row.rowIndex,
            JSON.stringify(row.data),
          ]);
        }

        for (const formula of records.formulas) {
          await conn.run(
            `INSERT INTO excel_formulas (id, table_id, file_name, sheet_name, cell_address, row_index, column_index,
              formula, readable_formula, dependencies)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              formula.id,
              formula.tableId,
              formula.fileName,
              formula.sheetName,
              formula.cellAddress,
              formula.rowIndex,
              formula.columnIndex,
              formula.formula,
              formula.readableFormula,
              JSON.stringify(formula.dependencies),
            ]
          );
        }

        await conn.run('COMMIT');
      } catch (error) {
        await conn.run('ROLLBACK');
        throw error;
      }
    });

    const summary = {
      tables: records.tableMetadata.length,
      rows: records.tableData.length,
      formulas: records.formulas.length,
    };
    console.log(
      `[DuckDB] Saved ${summary.tables} table(s), ${summary.rows} row(s), ${summary.formulas} formula(s)`
    );
    return summary;
  }

  /**
   * Stored table metadata for a workbook, in extraction order
   */
  async listTables(fileName: string): Promise<StoredTable[]> {
    return this.withConnection(async (conn) => {
      const reader = await conn.runAndReadAll(
        `SELECT id, file_name, sheet_name, table_name, provenance, cell_range, row_count, headers
         FROM table_metadata WHERE file_name = ? ORDER BY created_at, ordinal`,
        [fileName]
      );

      return reader.getRows().map((row) => ({
        id: toText(row[0]),
        fileName: toText(row[1]),
        sheetName: toText(row[2]),
        tableName: toText(row[3]),
        provenance: toText(row[4]),
        cellRange: toText(row[5]),
        rowCount: toNumber(row[6]),
        headers: headersSchema.parse(JSON.parse(toText(row[7]))),
      }));
    });
  }

  /**
   * Record counts stored for a workbook
   */
  async countRecords(fileName: string): Promise<SaveSummary> {
    return this.withConnection(async (conn) => {
      const reader = await conn.runAndReadAll(
        `SELECT
           (SELECT COUNT(*) FROM table_metadata WHERE file_name = $1),
           (SELECT COUNT(*) FROM table_data d JOIN table_metadata m ON d.table_id = m.id WHERE m.file_name = $1),
           (SELECT COUNT(*) FROM excel_formulas WHERE file_name = $1)`,
        [fileName]
      );

      const [row] = reader.getRows();
      return {
        tables: toNumber(row?.[0] ?? 0),
        rows: toNumber(row?.[1] ?? 0),
        formulas: toNumber(row?.[2] ?? 0),
      };
    });
  }

  /**
   * Close the database
   */
  async close(): Promise<void> {
    if (this.instance) {
      this.instance = null;
      console.log('[DuckDB] Database closed');
    }
  }

  private async withConnection<T>(work: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
    if (!this.instance) {
      throw new Error('Database not initialized');
    }

    const conn = await this.instance.connect();
    try {
      return await work(conn);
    } finally {
      conn.closeSync();
    }
  }
}

// ============================================================================
// Value Conversion
// ============================================================================

function toText(value: DuckDBValue): string {
  return value === null ? '' : String(value);
}

/**
 * DuckDB returns BigInt for COUNT and BIGINT columns
 */
function toNumber(value: DuckDBValue): number {
  if (typeof value === 'bigint' || typeof value === 'number') {
    return Number(value);
  }
  return Number(String(value));
}
