/**
 * Exchange document schema
 * JSON-safe rendering of one workbook's extraction, consumed by the
 * documentation and persistence collaborators
 */

import { z } from 'zod';

export const EXCHANGE_FORMAT_VERSION = 1;

// ============================================================================
// Values & References
// ============================================================================

export const encodedValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('number'), value: z.number().finite() }),
  z.object({ type: z.literal('text'), value: z.string() }),
  z.object({ type: z.literal('boolean'), value: z.boolean() }),
  z.object({ type: z.literal('date'), value: z.string().datetime() }),
  z.object({ type: z.literal('empty') }),
]);

const positionSchema = z.object({
  row: z.number().int().positive(),
  column: z.number().int().positive(),
});

const rangeBoundSchema = z.object({
  row: z.number().int().positive().nullable(),
  column: z.number().int().positive().nullable(),
});

const referenceSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('cell'),
    sheet: z.string(),
    address: z.string(),
    row: z.number().int().positive(),
    column: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('range'),
    sheet: z.string(),
    address: z.string(),
    start: rangeBoundSchema,
    end: rangeBoundSchema,
  }),
]);

// ============================================================================
// Tables, Formulas, Warnings
// ============================================================================

const tableSchema = z.object({
  name: z.string().min(1),
  provenance: z.enum(['explicit', 'implicit']),
  /** A1 range covering header, data and totals rows */
  range: z.string(),
  origin: positionSchema,
  extent: z.object({
    rows: z.number().int().positive(),
    columns: z.number().int().positive(),
  }),
  headers: z.array(z.string()),
  hasHeaderRow: z.boolean(),
  headerConfidence: z.number().min(0).max(100),
  headerUncertain: z.boolean(),
  totalsRowCount: z.number().int().nonnegative(),
  rows: z.array(
    z.object({
      row: z.number().int().positive(),
      values: z.record(z.string(), encodedValueSchema),
    })
  ),
});

const formulaSchema = z.object({
  address: z.string(),
  position: positionSchema,
  formula: z.string(),
  readableFormula: z.string(),
  table: z.string().nullable(),
  references: z.array(referenceSchema),
  cachedValue: encodedValueSchema,
});

const warningSchema = z.object({
  kind: z.enum(['DetectionWarning', 'FormulaParseWarning', 'SerializationError']),
  message: z.string(),
  position: positionSchema.optional(),
  table: z.string().optional(),
});

// ============================================================================
// Document
// ============================================================================

export const exchangeSheetSchema = z.object({
  name: z.string(),
  tables: z.array(tableSchema),
  formulas: z.array(formulaSchema),
  warnings: z.array(warningSchema),
});

export const exchangeDocumentSchema = z.object({
  version: z.literal(EXCHANGE_FORMAT_VERSION),
  workbook: z.string(),
  sheets: z.array(exchangeSheetSchema),
});

export type EncodedValue = z.infer<typeof encodedValueSchema>;
export type ExchangeTable = z.infer<typeof tableSchema>;
export type ExchangeFormula = z.infer<typeof formulaSchema>;
export type ExchangeWarning = z.infer<typeof warningSchema>;
export type ExchangeSheet = z.infer<typeof exchangeSheetSchema>;
export type ExchangeDocument = z.infer<typeof exchangeDocumentSchema>;
