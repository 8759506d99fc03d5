import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ExtractionDatabase } from '@/lib/db';
import { extractWorkbook } from '@/lib/excel/processor';
import { SheetGrid } from '@/lib/excel/sheet';
import { serializeExtraction } from '@/lib/exchange';

vi.spyOn(console, 'log').mockImplementation(() => undefined);

const document = serializeExtraction(
  extractWorkbook({
    fileName: 'calc.xlsx',
    format: 'xlsx',
    sheets: [
      SheetGrid.fromRows('Calc', [
        ['Qty', 'Price', 'Total'],
        [2, 3, '=A2*B2'],
        [4, 5, '=A3*B3'],
      ]),
    ],
  })
);

describe('ExtractionDatabase', () => {
  let database: ExtractionDatabase;

  beforeEach(async () => {
    database = new ExtractionDatabase();
    await database.initialize();
  });

  afterEach(async () => {
    await database.close();
  });

  it('saves a workbook snapshot', async () => {
    const summary = await database.saveWorkbook(document);

    expect(summary).toEqual({ tables: 1, rows: 2, formulas: 2 });
    expect(await database.countRecords('calc.xlsx')).toEqual(summary);
  });

  it('lists stored tables', async () => {
    let next = 0;
    await database.saveWorkbook(document, { generateId: () => `row-${++next}` });

    expect(await database.listTables('calc.xlsx')).toEqual([
      {
        id: 'row-1',
        fileName: 'calc.xlsx',
        sheetName: 'Calc',
        tableName: 'Table 1',
        provenance: 'implicit',
        cellRange: 'A1:C3',
        rowCount: 2,
        headers: ['Qty', 'Price', 'Total'],
      },
    ]);
  });

  it('appends a new snapshot on every save', async () => {
    await database.saveWorkbook(document);
    await database.saveWorkbook(document);

    expect(await database.countRecords('calc.xlsx')).toEqual({ tables: 2, rows: 4, formulas: 4 });
  });

  it('rolls back a failed snapshot', async () => {
    const records = {
      tableMetadata: [
        {
          id: 't1',
          fileName: 'bad.xlsx',
          sheetName: 'S',
          tableName: 'T',
          ordinal: 0,
          provenance: 'implicit' as const,
          cellRange: 'A1:A2',
          rowCount: 1,
          columnCount: 1,
          headers: ['A'],
          headerConfidence: 90,
          headerUncertain: false,
        },
      ],
      tableData: [{ id: 'd1', tableId: 'missing', rowIndex: 2, data: { A: 1 } }],
      formulas: [],
    };

    await expect(database.saveRecords(records)).rejects.toThrow();
    expect(await database.countRecords('bad.xlsx')).toEqual({ tables: 0, rows: 0, formulas: 0 });
  });

  it('refuses queries before initialization', async () => {
    await expect(new ExtractionDatabase().countRecords('calc.xlsx')).rejects.toThrow('Database not initialized');
  });
});
