/**
 * Database module exports
 */

export { ExtractionDatabase } from './duckdb';
export type { SaveSummary, StoredTable } from './duckdb';

export { buildPersistenceRecords } from './records';
export type {
  FormulaDataRecord,
  JsonScalar,
  PersistenceRecords,
  RecordOptions,
  TableDataRecord,
  TableMetadataRecord,
} from './records';
