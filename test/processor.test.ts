import { describe, expect, it, vi } from 'vitest';
import { extractSheet, extractWorkbook } from '@/lib/excel/processor';
import { SheetGrid } from '@/lib/excel/sheet';
import type { Cell, CellValue, Workbook } from '@/lib/types';
import { parseRangeAddress, rangeAddress, tableBounds } from '@/lib/utils';

class BrokenSheet extends SheetGrid {
  cells(): Cell[] {
    throw new Error('grid unavailable');
  }
}

class UnreadableSheet extends SheetGrid {
  getMergedValue(): CellValue {
    throw new Error('merge lookup failed');
  }
}

const sales = SheetGrid.fromRows(
  'Sales',
  [
    ['Region', 'Units', 'Price'],
    ['North', 10, 2],
    ['South', 4, 3],
    ['East', 7, 1],
    ['Total', '=SUM(B2:B4)', null],
    [],
    [],
    ['Code', 'Rate'],
    ['A', 0.1],
    ['B', 0.2],
  ],
  {
    tables: [
      {
        name: 'Sales',
        displayName: 'Sales',
        ref: 'A1:C5',
        bounds: parseRangeAddress('A1:C5'),
        headerRowCount: 1,
        totalsRowCount: 1,
        columns: ['Region', 'Units', 'Price'],
      },
    ],
  }
);

function workbook(...sheets: SheetGrid[]): Workbook {
  return { fileName: 'book.xlsx', format: 'xlsx', sheets };
}

describe('extractSheet', () => {
  it('returns explicit tables before implicit ones without overlap', () => {
    const result = extractSheet(sales);

    expect(result.tables.map((t) => [t.name, t.provenance, rangeAddress(tableBounds(t))])).toEqual([
      ['Sales', 'explicit', 'A1:C5'],
      ['Table 2', 'implicit', 'A8:B10'],
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('attaches formulas to the explicit table', () => {
    const [total] = extractSheet(sales).formulas;

    expect(total.address).toBe('B5');
    expect(total.table).toBe('Sales');
    expect(total.readableFormula).toBe('=SUM(B2:B4)');
  });

  it('handles a lone cell far from the data', () => {
    const sheet = new SheetGrid('Far', [
      { row: 1, column: 1, value: { kind: 'text', value: 'Qty' } },
      { row: 2, column: 1, value: { kind: 'number', value: 2 } },
      { row: 3, column: 1, value: { kind: 'empty' }, formula: '=A2*2' },
      { row: 1048576, column: 16384, value: { kind: 'text', value: 'note' } },
    ]);

    const result = extractSheet(sheet);

    expect(result.tables.map((t) => rangeAddress(tableBounds(t)))).toEqual(['A1:A3']);
    expect(result.formulas.map((f) => [f.address, f.table, f.readableFormula])).toEqual([
      ['A3', 'Table 1', '=[Qty]*2'],
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('keeps formulas when table detection fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const rows = SheetGrid.fromRows('Broken', [['Qty'], [2], ['=A2*2']]).cells();

    const result = extractSheet(new UnreadableSheet('Broken', rows));

    expect(result.tables).toEqual([]);
    expect(result.formulas.map((f) => [f.address, f.table, f.readableFormula])).toEqual([['A3', null, '=A2*2']]);
    expect(result.warnings).toEqual([
      { kind: 'DetectionWarning', sheet: 'Broken', message: 'Table detection failed: merge lookup failed' },
      { kind: 'DetectionWarning', sheet: 'Broken', message: 'No tables detected' },
    ]);
  });

  it('yields no tables for a blank sheet', () => {
    expect(extractSheet(SheetGrid.fromRows('Blank', []))).toEqual({
      sheet: 'Blank',
      tables: [],
      formulas: [],
      warnings: [{ kind: 'DetectionWarning', sheet: 'Blank', message: 'No tables detected' }],
    });
  });
});

describe('extractWorkbook', () => {
  it('keeps sheet order and names the workbook', () => {
    const result = extractWorkbook(workbook(sales, SheetGrid.fromRows('Blank', [])));

    expect(result.workbook).toBe('book.xlsx');
    expect(result.sheets.map((s) => s.sheet)).toEqual(['Sales', 'Blank']);
  });

  it('turns a failing sheet into a warning and continues', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken = new BrokenSheet('Broken', []);

    const result = extractWorkbook(workbook(broken, sales));

    expect(result.sheets[0]).toEqual({
      sheet: 'Broken',
      tables: [],
      formulas: [],
      warnings: [
        { kind: 'DetectionWarning', sheet: 'Broken', message: 'Sheet extraction failed: grid unavailable' },
      ],
    });
    expect(result.sheets[1].tables).toHaveLength(2);
  });

  it('stops when cancelled', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => extractWorkbook(workbook(sales), { signal: controller.signal })).toThrow();
  });

  it('produces identical results on repeated runs', () => {
    expect(extractWorkbook(workbook(sales))).toEqual(extractWorkbook(workbook(sales)));
  });
});
