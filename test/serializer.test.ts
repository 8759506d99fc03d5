import { describe, expect, it } from 'vitest';
import { ExchangeFormatError, SerializationError } from '@/lib/errors';
import { extractWorkbook } from '@/lib/excel/processor';
import { SheetGrid } from '@/lib/excel/sheet';
import {
  encodeCellValue,
  parseExchangeDocument,
  parseExchangeJson,
  serializeExtraction,
  toExtractionResult,
  toJson,
} from '@/lib/exchange/serializer';
import type { ExtractionResult, Table } from '@/lib/types';

const sheet = SheetGrid.fromRows('Orders', [
  ['Item', 'Qty', 'Shipped', 'Ordered', 'Total'],
  ['Pen', 2, true, new Date('2024-01-15T00:00:00.000Z'), '=B2*3'],
  ['Ink', 5, false, null, { formula: 'B3*3', value: 15 }],
]);

const result = extractWorkbook({ fileName: 'orders.xlsx', format: 'xlsx', sheets: [sheet] });

function withValue(table: Table, value: number): ExtractionResult {
  return {
    workbook: 'bad.xlsx',
    sheets: [
      {
        sheet: 'Data',
        tables: [{ ...table, rows: [{ row: 2, values: { Item: { kind: 'number', value } } }] }],
        formulas: [],
        warnings: [{ kind: 'DetectionWarning', sheet: 'Data', message: 'earlier' }],
      },
    ],
  };
}

describe('serializeExtraction', () => {
  it('encodes typed values', () => {
    const document = serializeExtraction(result);
    const [table] = document.sheets[0].tables;

    expect(document.version).toBe(1);
    expect(table.range).toBe('A1:E3');
    expect(table.rows[0].values).toEqual({
      Item: { type: 'text', value: 'Pen' },
      Qty: { type: 'number', value: 2 },
      Shipped: { type: 'boolean', value: true },
      Ordered: { type: 'date', value: '2024-01-15T00:00:00.000Z' },
      Total: { type: 'empty' },
    });
    expect(table.rows[1].values.Ordered).toEqual({ type: 'empty' });
  });

  it('encodes formulas with readable text and cached values', () => {
    const formulas = serializeExtraction(result).sheets[0].formulas;

    expect(formulas.map((f) => [f.address, f.readableFormula, f.table, f.cachedValue])).toEqual([
      ['E2', '=[Qty]*3', 'Table 1', { type: 'empty' }],
      ['E3', '=[Qty]*3', 'Table 1', { type: 'number', value: 15 }],
    ]);
  });

  it('round-trips through JSON text', () => {
    const text = toJson(serializeExtraction(result));

    expect(toExtractionResult(parseExchangeJson(text))).toEqual(result);
  });

  it('round-trips a table whose header is __proto__', () => {
    const protoSheet = SheetGrid.fromRows('Keys', [
      ['__proto__', 'Qty'],
      ['a', 1],
      ['b', 2],
    ]);
    const original = extractWorkbook({ fileName: 'keys.xlsx', format: 'xlsx', sheets: [protoSheet] });

    expect(original.sheets[0].tables[0].headers).toEqual(['__proto___1', 'Qty']);
    expect(toExtractionResult(parseExchangeJson(toJson(serializeExtraction(original))))).toEqual(original);
  });

  it('replaces unencodable values with a placeholder and warns', () => {
    const table = result.sheets[0].tables[0];
    const document = serializeExtraction(withValue(table, Number.NaN));
    const [exchangeSheet] = document.sheets;

    expect(exchangeSheet.tables[0].rows[0].values.Item).toEqual({ type: 'empty' });
    expect(exchangeSheet.warnings).toEqual([
      { kind: 'DetectionWarning', message: 'earlier' },
      { kind: 'SerializationError', message: 'Number NaN at A2 has no encoding', position: { row: 2, column: 1 } },
    ]);
  });

  it('throws SerializationError when encoding a single non-finite value', () => {
    expect(() => encodeCellValue({ kind: 'number', value: Infinity }, 'Data', { row: 1, column: 2 })).toThrow(
      SerializationError
    );
  });
});

describe('parseExchangeDocument', () => {
  it('rejects documents with the wrong version', () => {
    const document = { ...serializeExtraction(result), version: 2 };

    expect(() => parseExchangeDocument(document)).toThrow(ExchangeFormatError);
  });

  it('reports the path of each issue', () => {
    try {
      parseExchangeDocument({ version: 1, workbook: 'x.xlsx', sheets: [{ name: 'S', tables: [], formulas: [] }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExchangeFormatError);
      if (error instanceof ExchangeFormatError) {
        expect(error.issues).toEqual(['sheets.0.warnings: Required']);
      }
    }
  });

  it('rejects malformed JSON', () => {
    expect(() => parseExchangeJson('{')).toThrow(ExchangeFormatError);
  });
});
